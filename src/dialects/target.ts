import type { ConnectionConfig } from '../engine/types';

/**
 * Target dialect interface.
 * Implement this to load an artifact produced by a source dialect.
 */
export interface TargetDialect {
  /** Unique name for logging and diagnostics */
  readonly name: string;

  /** Replay `artifactPath` against the database described by `config`. Rejects on tool failure. */
  load(config: ConnectionConfig, artifactPath: string): Promise<void>;
}
