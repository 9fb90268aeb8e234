import type { ResolvedPath } from '../../graph/symbolGraph';
import type { IrTypeRef } from '../../ir/irV1';
import { UnsupportedGenericArgumentError } from '../errors';
import { notPortable, portable, type NormalizeFn, type TypeNormalization } from './result';

/** `std::collections::HashMap` -> `HashMap` */
export function lastPathSegment(name: string): string {
  const parts = name.split('::');
  return parts[parts.length - 1] ?? name;
}

/**
 * Map a resolved path to SIMPLE or GENERIC.
 *
 * Parenthesized arguments (`Fn(A) -> B`) are treated as no arguments at all, so such a path maps to
 * SIMPLE with the trait's name.
 */
export function resolvedPathToIr(path: ResolvedPath, map: NormalizeFn): TypeNormalization {
  const name = lastPathSegment(path.name);
  const args = path.args;
  if (!args || args.kind === 'parenthesized') return portable({ kind: 'SIMPLE', name });

  const typeArgs: IrTypeRef[] = [];
  for (const arg of args.args) {
    switch (arg.kind) {
      case 'type': {
        const mapped = map(arg.type);
        if (mapped.type === null) return notPortable(`${name}<..> argument: ${mapped.reason}`);
        typeArgs.push(mapped.type);
        break;
      }
      case 'lifetime':
      case 'const':
      case 'infer':
        throw new UnsupportedGenericArgumentError(arg.kind, name);
      default: {
        const unreachable: never = arg;
        throw new Error(`Unhandled generic argument: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  if (typeArgs.length === 0) return portable({ kind: 'SIMPLE', name });
  return portable({ kind: 'GENERIC', name, typeArgs });
}
