import type { CommandExecutor } from '../engine/command';
import type { Logger } from '../engine/logger';
import type { ConnectionConfig } from '../engine/types';

/**
 * Source dialect interface.
 * Implement this to extract a full database into a single artifact file.
 */
export interface SourceDialect {
  /** Unique name for logging and diagnostics */
  readonly name: string;

  /** Dump the whole database described by `config` to `artifactPath`. Rejects on tool failure. */
  extract(config: ConnectionConfig, artifactPath: string): Promise<void>;
}

/**
 * Collaborators shared by every dialect factory
 */
export type DialectOptions = {
  execute?: CommandExecutor;
  logger?: Logger;
};
