export { rawTypeToIr } from './typeToIr';
export { resolvedPathToIr, lastPathSegment } from './namedGeneric';
export { collectReferencedIds } from './collect';
export { renderIrTypeRef } from './render';
export { primitiveToIr, specialPrimitiveToken, PRIMITIVE_TOKENS } from './primitives';
export type { TypeNormalization, NormalizeFn } from './result';
