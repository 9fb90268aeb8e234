import type { IrTypeRef, SpecialPrimitive } from '../../ir/irV1';
import { UnknownPrimitiveError } from '../errors';

// Exact tokens as they appear in the graph, in table order.
const PRIMITIVE_TABLE: ReadonlyArray<readonly [string, SpecialPrimitive]> = [
  ['String', 'String'],
  ['char', 'Char'],
  ['i8', 'I8'],
  ['i16', 'I16'],
  ['i32', 'I32'],
  ['i64', 'I64'],
  ['u8', 'U8'],
  ['u16', 'U16'],
  ['u32', 'U32'],
  ['u64', 'U64'],
  ['isize', 'ISize'],
  ['usize', 'USize'],
  ['bool', 'Bool'],
  ['f32', 'F32'],
  ['f64', 'F64'],
  ['I54', 'I54'],
  ['U53', 'U53'],
];

const SPECIAL_BY_TOKEN = new Map<string, SpecialPrimitive>(PRIMITIVE_TABLE);
const TOKEN_BY_SPECIAL = new Map<SpecialPrimitive, string>(PRIMITIVE_TABLE.map(([token, special]) => [special, token]));

export const PRIMITIVE_TOKENS: readonly string[] = PRIMITIVE_TABLE.map(([token]) => token);

export function primitiveToIr(token: string): IrTypeRef {
  const special = SPECIAL_BY_TOKEN.get(token);
  if (!special) throw new UnknownPrimitiveError(token);
  return { kind: 'SPECIAL', special: { name: special } };
}

/** The exact graph token a special primitive was normalized from. */
export function specialPrimitiveToken(special: SpecialPrimitive): string {
  const token = TOKEN_BY_SPECIAL.get(special);
  if (token === undefined) throw new Error(`No token for special primitive ${special}`);
  return token;
}
