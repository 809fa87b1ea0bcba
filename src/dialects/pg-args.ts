import type { ConnectionConfig } from '../engine/types';

/**
 * Host, port, user and database flags shared by the PostgreSQL client tools.
 * The password is never part of the argument list.
 */
export const connectionArgs = (config: ConnectionConfig): string[] => {
  const args = ['-h', config.host];
  if (config.port !== undefined) args.push('-p', String(config.port));
  args.push('-U', config.user, '-d', config.dbname);
  return args;
};
