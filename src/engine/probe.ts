import { setTimeout as delay } from 'node:timers/promises';
import type { ProbeOptions, ReadinessCheck, Sleep } from './types';
import { executeCommand, type CommandExecutor } from './command';
import { ProbeFailure } from './errors';
import { log, formatError, type Logger } from './logger';

export const ACCEPTING_CONNECTIONS = 'accepting connections';

export const DEFAULT_PROBE_OPTIONS: Readonly<ProbeOptions> = {
  maxRetries: 5,
  delaySeconds: 5,
};

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

/**
 * Readiness check backed by `pg_isready -h <host>`.
 */
export const createPgIsReadyCheck = (execute: CommandExecutor = executeCommand): ReadinessCheck => {
  return async (host, port) => {
    const args = ['-h', host];
    if (port !== undefined) args.push('-p', String(port));

    const { exitCode, stdout } = await execute('pg_isready', args, { stdout: 'capture' });
    return { exitCode, stdout };
  };
};

export type WaitOptions = Partial<ProbeOptions> & {
  port?: number;
  check?: ReadinessCheck;
  sleep?: Sleep;
  logger?: Logger;
};

const validateProbeOptions = ({ maxRetries, delaySeconds }: ProbeOptions): void => {
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new RangeError(`maxRetries must be a non-negative integer, got ${maxRetries}`);
  }
  if (!Number.isFinite(delaySeconds) || delaySeconds < 0) {
    throw new RangeError(`delaySeconds must be a non-negative number, got ${delaySeconds}`);
  }
};

/**
 * Poll `host` until its readiness check reports accepting connections.
 *
 * Resolves `false` once `maxRetries` attempts have failed; never rejects because of the check itself.
 * With `maxRetries` 0 no check runs at all. There is no sleep after the last failed attempt.
 */
export const waitForAvailable = async (host: string, options: WaitOptions = {}): Promise<boolean> => {
  const maxRetries = options.maxRetries ?? DEFAULT_PROBE_OPTIONS.maxRetries;
  const delaySeconds = options.delaySeconds ?? DEFAULT_PROBE_OPTIONS.delaySeconds;
  validateProbeOptions({ maxRetries, delaySeconds });

  const check = options.check ?? createPgIsReadyCheck();
  const sleep = options.sleep ?? defaultSleep;
  const logger = options.logger ?? log;

  let retries = 0;

  while (retries < maxRetries) {
    const failure = await attempt(check, host, options.port, retries + 1);

    if (!failure) {
      logger.success(`PostgreSQL server ${host} is available`);
      return true;
    }

    retries++;
    logger.error(failure.message);

    if (retries < maxRetries) {
      logger.info(`Retrying in ${delaySeconds} seconds...`);
      await sleep(delaySeconds * 1000);
    }
  }

  logger.error(`PostgreSQL server ${host} is not available after ${maxRetries} retries`);
  return false;
};

const attempt = async (
  check: ReadinessCheck,
  host: string,
  port: number | undefined,
  attemptNumber: number
): Promise<ProbeFailure | undefined> => {
  try {
    const { exitCode, stdout } = await check(host, port);
    if (exitCode !== 0) {
      return new ProbeFailure(host, attemptNumber, `pg_isready exited with code ${exitCode}`);
    }
    if (!stdout.includes(ACCEPTING_CONNECTIONS)) {
      return new ProbeFailure(host, attemptNumber, `unexpected response "${stdout.trim()}"`);
    }
    return undefined;
  } catch (err) {
    return new ProbeFailure(host, attemptNumber, formatError(err), err);
  }
};
