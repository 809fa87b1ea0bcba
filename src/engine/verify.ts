import Knex, { type Knex as KnexType } from 'knex';
import type { ConnectionConfig, ConnectionPair } from './types';
import { VerificationFailure } from './errors';
import { log, type Logger } from './logger';

export type TableCounter = (config: ConnectionConfig, logger?: Logger) => Promise<number>;

export type TableCountComparison = {
  source: number;
  destination: number;
  matches: boolean;
};

export const compareTableCounts = (source: number, destination: number): TableCountComparison => ({
  source,
  destination,
  matches: source === destination,
});

/**
 * Routes knex's own warnings into the run's logger.
 */
export const createKnexLogger = (logger: Logger): KnexType.Logger => ({
  warn(message: string) {
    logger.warn(`[knex] ${message}`);
  },
  error(message: string) {
    logger.error(`[knex] ${message}`);
  },
  deprecate(method: string, alternative: string) {
    logger.warn(`[knex deprecate] ${method} is deprecated, use ${alternative}`);
  },
  debug() {},
});

const createClient = (config: ConnectionConfig, logger: Logger): KnexType =>
  Knex({
    client: 'pg',
    connection: {
      host: config.host,
      port: config.port ?? 5432,
      user: config.user,
      password: config.password,
      database: config.dbname,
      application_name: 'pg-elt-verify',
    },
    pool: { min: 0, max: 1 },
    log: createKnexLogger(logger),
  });

/**
 * Number of base tables in the public schema.
 */
export const countPublicTables: TableCounter = async (config, logger = log) => {
  const client = createClient(config, logger);

  try {
    const result = await client.raw<{ rows: Array<{ count: string }> }>(
      'SELECT count(*) AS count FROM information_schema.tables WHERE table_schema = ? AND table_type = ?',
      ['public', 'BASE TABLE']
    );
    return Number(result.rows[0]?.count ?? 0);
  } finally {
    await client.destroy();
  }
};

/**
 * Compare public table counts on both sides after a load.
 * Rejects with VerificationFailure on a mismatch.
 */
export const verifyTransfer = async (
  connections: ConnectionPair,
  countTables: TableCounter = countPublicTables,
  logger: Logger = log
): Promise<TableCountComparison> => {
  const source = await countTables(connections.source, logger);
  const destination = await countTables(connections.destination, logger);
  const comparison = compareTableCounts(source, destination);

  if (!comparison.matches) {
    throw new VerificationFailure(
      `table count mismatch: source has ${source}, destination has ${destination}`
    );
  }

  logger.info(`Verified ${destination} public tables on both sides`);
  return comparison;
};
