import type { GenericArgs, RawType, ResolvedPath } from '../../graph/symbolGraph';
import { lastPathSegment } from '../typeRefImpl';

/**
 * Source-like text for a raw type. Unlike the type IR this never fails: it is only used for display
 * (impl targets, types that have no portable form).
 */
export function renderRawType(raw: RawType): string {
  switch (raw.kind) {
    case 'resolved_path':
      return renderResolvedPath(raw.path);
    case 'primitive':
    case 'generic':
      return raw.name;
    case 'tuple':
      return `(${raw.types.map(renderRawType).join(', ')})`;
    case 'slice':
      return `[${renderRawType(raw.type)}]`;
    case 'array':
      return `[${renderRawType(raw.type)}; ${raw.len}]`;
    case 'dyn_trait':
      return `dyn ${raw.traits.map(renderResolvedPath).join(' + ')}`;
    case 'function_pointer':
      return 'fn(..)';
    case 'impl_trait':
      return 'impl ..';
    case 'infer':
      return '_';
    case 'raw_pointer':
      return `*${raw.mutable ? 'mut' : 'const'} ${renderRawType(raw.type)}`;
    case 'borrowed_ref': {
      const lifetime = raw.lifetime ? `${raw.lifetime} ` : '';
      return `&${lifetime}${raw.mutable ? 'mut ' : ''}${renderRawType(raw.type)}`;
    }
    case 'qualified_path':
      return `<${renderRawType(raw.self_type)}>::${raw.name}`;
    default: {
      const unreachable: never = raw;
      throw new Error(`Unhandled raw type: ${JSON.stringify(unreachable)}`);
    }
  }
}

function renderResolvedPath(path: ResolvedPath): string {
  return lastPathSegment(path.name) + renderGenericArgs(path.args);
}

function renderGenericArgs(args: GenericArgs | null): string {
  if (args === null) return '';
  if (args.kind === 'parenthesized') {
    const output = args.output ? ` -> ${renderRawType(args.output)}` : '';
    return `(${args.inputs.map(renderRawType).join(', ')})${output}`;
  }
  if (args.args.length === 0) return '';
  const parts = args.args.map((arg) => {
    switch (arg.kind) {
      case 'lifetime':
        return arg.name;
      case 'type':
        return renderRawType(arg.type);
      case 'const':
        return arg.expr;
      case 'infer':
        return '_';
    }
  });
  return `<${parts.join(', ')}>`;
}
