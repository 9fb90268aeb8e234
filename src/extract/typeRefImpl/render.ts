import type { IrTypeRef } from '../../ir/irV1';
import { specialPrimitiveToken } from './primitives';

/** Render a type IR value the way it would be written in the source (`Vec<u8>`, `(i32, String)`). */
export function renderIrTypeRef(t: IrTypeRef): string {
  switch (t.kind) {
    case 'SIMPLE':
      return t.name;
    case 'GENERIC':
      return `${t.name}<${t.typeArgs.map(renderIrTypeRef).join(', ')}>`;
    case 'SPECIAL': {
      const special = t.special;
      if (special.name === 'Unit') return '()';
      if (special.name === 'Tuple') return `(${special.elements.map(renderIrTypeRef).join(', ')})`;
      return specialPrimitiveToken(special.name);
    }
    default: {
      const unreachable: never = t;
      throw new Error(`Unhandled type ref: ${JSON.stringify(unreachable)}`);
    }
  }
}
