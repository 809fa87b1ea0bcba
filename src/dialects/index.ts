export type { SourceDialect, DialectOptions } from './source';
export type { TargetDialect } from './target';
export { createSource, listSourceTypes, registerSource } from './source-registry';
export { createTarget, listTargetTypes, registerTarget } from './target-registry';
