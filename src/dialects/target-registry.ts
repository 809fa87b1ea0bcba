import type { TargetDialect } from './target';
import type { DialectOptions } from './source';

type TargetDialectFactory = (options: DialectOptions) => TargetDialect;

const targets: Record<string, TargetDialectFactory> = {};

/**
 * Register a target dialect factory.
 * Call this in each dialect implementation to register itself.
 */
export const registerTarget = (type: string, factory: TargetDialectFactory): void => {
  targets[type] = factory;
};

/**
 * Create a target dialect by type
 */
export const createTarget = (type: string, options: DialectOptions = {}): TargetDialect => {
  const factory = targets[type];
  if (!factory) {
    const available = Object.keys(targets).join(', ');
    throw new Error(`Unknown target type "${type}". Available: ${available}`);
  }
  return factory(options);
};

/**
 * List all registered target types
 */
export const listTargetTypes = (): string[] => Object.keys(targets);
