import type { RawType } from '../../graph/symbolGraph';
import type { IrTypeRef } from '../../ir/irV1';

/**
 * Outcome of normalizing one raw type. `type: null` means the type has no portable representation;
 * `reason` says which part of it could not be mapped.
 */
export type TypeNormalization = { type: IrTypeRef } | { type: null; reason: string };

export type NormalizeFn = (raw: RawType) => TypeNormalization;

export function portable(type: IrTypeRef): TypeNormalization {
  return { type };
}

export function notPortable(reason: string): TypeNormalization {
  return { type: null, reason };
}
