import type { RawType } from '../../graph/symbolGraph';
import type { IrTypeRef } from '../../ir/irV1';
import { resolvedPathToIr } from './namedGeneric';
import { primitiveToIr } from './primitives';
import { notPortable, portable, type TypeNormalization } from './result';

/**
 * Convert a raw graph type to the type IR.
 *
 * Only primitives, resolved paths (with type arguments) and tuples have a portable form. Everything
 * else, and anything containing one of those, is reported as not portable so that the caller can
 * leave the field out. Unknown primitive tokens and unsupported generic argument kinds throw.
 */
export function rawTypeToIr(raw: RawType): TypeNormalization {
  switch (raw.kind) {
    case 'primitive':
      return portable(primitiveToIr(raw.name));
    case 'resolved_path':
      return resolvedPathToIr(raw.path, rawTypeToIr);
    case 'tuple':
      return tupleToIr(raw.types);
    case 'generic':
      return notPortable(`generic parameter ${raw.name}`);
    case 'dyn_trait':
      return notPortable('trait object');
    case 'function_pointer':
      return notPortable('function pointer');
    case 'slice':
      return notPortable('slice');
    case 'array':
      return notPortable('fixed-size array');
    case 'impl_trait':
      return notPortable('opaque impl type');
    case 'infer':
      return notPortable('inferred type');
    case 'raw_pointer':
      return notPortable('raw pointer');
    case 'borrowed_ref':
      return notPortable('borrowed reference');
    case 'qualified_path':
      return notPortable(`qualified path ${raw.name}`);
    default: {
      const unreachable: never = raw;
      throw new Error(`Unhandled raw type: ${JSON.stringify(unreachable)}`);
    }
  }
}

function tupleToIr(types: RawType[]): TypeNormalization {
  if (types.length === 0) return portable({ kind: 'SPECIAL', special: { name: 'Unit' } });

  const elements: IrTypeRef[] = [];
  for (const [i, t] of types.entries()) {
    const mapped = rawTypeToIr(t);
    if (mapped.type === null) return notPortable(`tuple element ${i}: ${mapped.reason}`);
    elements.push(mapped.type);
  }
  return portable({ kind: 'SPECIAL', special: { name: 'Tuple', elements } });
}
