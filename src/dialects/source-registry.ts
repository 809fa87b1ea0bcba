import type { SourceDialect, DialectOptions } from './source';

type SourceDialectFactory = (options: DialectOptions) => SourceDialect;

const sources: Record<string, SourceDialectFactory> = {};

/**
 * Register a source dialect factory.
 * Call this in each dialect implementation to register itself.
 */
export const registerSource = (type: string, factory: SourceDialectFactory): void => {
  sources[type] = factory;
};

/**
 * Create a source dialect by type
 */
export const createSource = (type: string, options: DialectOptions = {}): SourceDialect => {
  const factory = sources[type];
  if (!factory) {
    const available = Object.keys(sources).join(', ');
    throw new Error(`Unknown source type "${type}". Available: ${available}`);
  }
  return factory(options);
};

/**
 * List all registered source types
 */
export const listSourceTypes = (): string[] => Object.keys(sources);
