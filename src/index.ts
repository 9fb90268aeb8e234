// Public library surface.

export { VERSION } from './version';

export * from './graph/symbolGraph';
export * from './graph/graphIndex';
export * from './graph/loadSymbolGraph';
export * from './extract/errors';
export * from './extract/typeRef';
export * from './extract/publicApi';
export type { PublicItem } from './extract/render/publicItem';
export type { RootSpec, Seed } from './extract/roots/findRoots';
export * from './config/loadConfig';
export * from './ir/irV1';
export * from './ir/buildIrModel';
export * from './ir/writeIrJson';
export * from './ir/canonicalizeIrModel';
export * from './ir/deterministicJson';
export * from './report/extractionReport';
export * from './report/writeReport';
export * from './scan/graphScanner';
export * from './scan/inventory';
export * from './core/generateIrFromGraph';
