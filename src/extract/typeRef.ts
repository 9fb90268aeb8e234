// Type normalizer entry points; the mapping itself lives in ./typeRefImpl.
export {
  rawTypeToIr as normalizeType,
  collectReferencedIds,
  renderIrTypeRef,
  specialPrimitiveToken,
  PRIMITIVE_TOKENS,
} from './typeRefImpl';
export type { TypeNormalization } from './typeRefImpl';
