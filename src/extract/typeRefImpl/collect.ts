import type { GenericArgs, Id, RawType } from '../../graph/symbolGraph';

/**
 * Collect the Ids of all named items a raw type refers to, outermost first (`Vec<Foo>` yields the
 * Id of `Vec`, then of `Foo`). Trait references of trait objects are not data and are skipped.
 */
export function collectReferencedIds(raw: RawType, out: Id[] = []): Id[] {
  switch (raw.kind) {
    case 'resolved_path':
      out.push(raw.path.id);
      if (raw.path.args) collectFromArgs(raw.path.args, out);
      break;
    case 'tuple':
      for (const t of raw.types) collectReferencedIds(t, out);
      break;
    case 'slice':
    case 'array':
    case 'raw_pointer':
    case 'borrowed_ref':
      collectReferencedIds(raw.type, out);
      break;
    case 'qualified_path':
      collectReferencedIds(raw.self_type, out);
      break;
    case 'primitive':
    case 'generic':
    case 'dyn_trait':
    case 'function_pointer':
    case 'impl_trait':
    case 'infer':
      break;
    default: {
      const unreachable: never = raw;
      throw new Error(`Unhandled raw type: ${JSON.stringify(unreachable)}`);
    }
  }
  return out;
}

function collectFromArgs(args: GenericArgs, out: Id[]): void {
  if (args.kind === 'parenthesized') {
    for (const t of args.inputs) collectReferencedIds(t, out);
    if (args.output) collectReferencedIds(args.output, out);
    return;
  }
  for (const arg of args.args) {
    if (arg.kind === 'type') collectReferencedIds(arg.type, out);
  }
}
