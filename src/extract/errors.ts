import type { Id } from '../graph/symbolGraph';

/**
 * A data-bearing item (struct, struct-like variant, union) whose fields are hidden from the graph.
 * A binding cannot be generated for it, so the whole extraction is aborted.
 */
export class InaccessibleFieldsError extends Error {
  constructor(
    readonly itemName: string,
    readonly itemId: Id,
  ) {
    super(
      `The ${itemName} type has inaccessible fields. Make its fields public so that bindings can be generated for it.`,
    );
    this.name = 'InaccessibleFieldsError';
  }
}

export class UnknownPrimitiveError extends Error {
  constructor(readonly primitive: string) {
    super(`Unknown primitive type: ${primitive}`);
    this.name = 'UnknownPrimitiveError';
  }
}

/**
 * Lifetime, const and inferred generic arguments are not mapped to the type IR yet.
 * Hitting one is a gap in this tool, not a problem with the input.
 */
export class UnsupportedGenericArgumentError extends Error {
  constructor(
    readonly argumentKind: 'lifetime' | 'const' | 'infer',
    readonly typeName: string,
  ) {
    super(`Not implemented: ${argumentKind} generic argument in ${typeName}<...>`);
    this.name = 'UnsupportedGenericArgumentError';
  }
}
