import type { SourceDialect, DialectOptions } from '../source';
import type { ConnectionConfig } from '../../engine/types';
import { registerSource } from '../source-registry';
import { connectionArgs } from '../pg-args';
import { executeCommand, credentialEnv, runChecked, type CommandExecutor } from '../../engine/command';
import { ExtractFailure } from '../../engine/errors';
import { log, formatError, type Logger } from '../../engine/logger';

export const buildDumpArgs = (config: ConnectionConfig, artifactPath: string): string[] => [
  ...connectionArgs(config),
  '-f',
  artifactPath,
  // never prompt; the password comes from PGPASSWORD
  '-w',
];

/**
 * PostgreSQL source dialect.
 * Runs pg_dump once for the whole database, plain SQL format.
 */
class PostgreSQLSource implements SourceDialect {
  readonly name = 'postgresql';

  private readonly execute: CommandExecutor;
  private readonly logger: Logger;

  constructor(options: DialectOptions) {
    this.execute = options.execute ?? executeCommand;
    this.logger = options.logger ?? log;
  }

  async extract(config: ConnectionConfig, artifactPath: string): Promise<void> {
    this.logger.info(`Running pg_dump for ${config.dbname}@${config.host}`);

    try {
      await runChecked(this.execute, 'pg_dump', buildDumpArgs(config, artifactPath), {
        env: credentialEnv(config.password),
        stdout: 'inherit',
      });
    } catch (err) {
      throw new ExtractFailure(`pg_dump of ${config.dbname}@${config.host} failed: ${formatError(err)}`, {
        cause: err,
      });
    }

    this.logger.info(`Dump written to ${artifactPath}`);
  }
}

export const createPostgreSQLSource = (options: DialectOptions = {}): SourceDialect => new PostgreSQLSource(options);

registerSource('postgresql', createPostgreSQLSource);
