import type { TargetDialect } from '../target';
import type { DialectOptions } from '../source';
import type { ConnectionConfig } from '../../engine/types';
import { registerTarget } from '../target-registry';
import { connectionArgs } from '../pg-args';
import { executeCommand, credentialEnv, runChecked, type CommandExecutor } from '../../engine/command';
import { LoadFailure } from '../../engine/errors';
import { log, formatError, type Logger } from '../../engine/logger';

export const buildLoadArgs = (config: ConnectionConfig, artifactPath: string): string[] => [
  ...connectionArgs(config),
  '-a',
  // psql exits 0 on SQL errors unless told otherwise
  '-v',
  'ON_ERROR_STOP=1',
  '-f',
  artifactPath,
  '-w',
];

/**
 * PostgreSQL target dialect.
 * Replays a plain SQL dump through psql.
 */
class PostgreSQLTarget implements TargetDialect {
  readonly name = 'postgresql';

  private readonly execute: CommandExecutor;
  private readonly logger: Logger;

  constructor(options: DialectOptions) {
    this.execute = options.execute ?? executeCommand;
    this.logger = options.logger ?? log;
  }

  async load(config: ConnectionConfig, artifactPath: string): Promise<void> {
    this.logger.info(`Running psql against ${config.dbname}@${config.host}`);

    try {
      await runChecked(this.execute, 'psql', buildLoadArgs(config, artifactPath), {
        env: credentialEnv(config.password),
        stdout: 'inherit',
      });
    } catch (err) {
      throw new LoadFailure(`psql load into ${config.dbname}@${config.host} failed: ${formatError(err)}`, {
        cause: err,
      });
    }

    this.logger.info(`Loaded ${artifactPath}`);
  }
}

export const createPostgreSQLTarget = (options: DialectOptions = {}): TargetDialect => new PostgreSQLTarget(options);

registerTarget('postgresql', createPostgreSQLTarget);
