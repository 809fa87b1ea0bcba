import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  probeCommand,
  reportFatalError,
  resolveOptions,
  runCommand,
  type CliOptions,
  type PipelineBanner,
} from './commands';
import { ConfigurationError } from './engine/errors';
import type { ConnectionConfig, ReadinessCheck, ReadinessCheckResult } from './engine/types';
import type { SourceDialect } from './dialects/source';
import type { TargetDialect } from './dialects/target';
import { createRecordingLogger } from './testing/recording-logger';

const FULL_CONFIG = `
[source_postgres]
dbname = shop
user = reader
password = test-secret
host = source_postgres

[destination_postgres]
dbname = warehouse
user = writer
password = other-secret
host = destination_postgres
`;

const ready: ReadinessCheckResult = { exitCode: 0, stdout: 'source_postgres:5432 - accepting connections' };
const down: ReadinessCheckResult = { exitCode: 2, stdout: 'source_postgres:5432 - no response' };

const checkByHost = (results: Record<string, ReadinessCheckResult>) =>
  jest.fn<ReturnType<ReadinessCheck>, Parameters<ReadinessCheck>>(async (host) => results[host] ?? down);

const createBanner = () => {
  const start = jest.fn<void, Parameters<PipelineBanner['start']>>();
  const summary = jest.fn<void, Parameters<PipelineBanner['summary']>>();
  const banner: PipelineBanner = { start, summary };
  return { banner, start, summary };
};

describe('resolveOptions', () => {
  it('falls back to the defaults', () => {
    const options = resolveOptions({ 'run-id': 'run-1' }, {});

    expect(options).toEqual({
      configPath: 'config.ini',
      sourceType: 'postgresql',
      targetType: 'postgresql',
      probe: { maxRetries: 5, delaySeconds: 5 },
      artifactDir: process.cwd(),
      runId: 'run-1',
      verify: false,
    });
  });

  it('reads the environment when no flag is given', () => {
    const options = resolveOptions(
      {},
      {
        ELT_CONFIG: 'staging.ini',
        PROBE_MAX_RETRIES: '2',
        PROBE_DELAY_SECONDS: '0.5',
        ELT_ARTIFACT_DIR: '/tmp/dumps',
        ELT_VERIFY: 'true',
      }
    );

    expect(options.configPath).toBe('staging.ini');
    expect(options.probe).toEqual({ maxRetries: 2, delaySeconds: 0.5 });
    expect(options.artifactDir).toBe('/tmp/dumps');
    expect(options.verify).toBe(true);
  });

  it('prefers flags over the environment', () => {
    const options = resolveOptions({ 'max-retries': '0', delay: '1' }, { PROBE_MAX_RETRIES: '9' });

    expect(options.probe).toEqual({ maxRetries: 0, delaySeconds: 1 });
  });

  it.each(['1.5', '-1', 'Infinity', 'abc'])('rejects --max-retries %s', (raw) => {
    expect(() => resolveOptions({ 'max-retries': raw }, {})).toThrow(
      new ConfigurationError('invalid-value', `--max-retries must be a non-negative integer, got "${raw}"`)
    );
  });

  it.each(['-1', 'Infinity', 'abc', ' '])('rejects --delay "%s"', (raw) => {
    expect(() => resolveOptions({ delay: raw }, {})).toThrow(`--delay must be a non-negative number, got "${raw}"`);
  });

  it('rejects a bad value from the environment too', () => {
    expect(() => resolveOptions({}, { PROBE_MAX_RETRIES: '2.5' })).toThrow(ConfigurationError);
  });
});

describe('commands', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pg-elt-commands-'));
    configPath = path.join(dir, 'config.ini');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const buildOptions = (overrides: Partial<CliOptions> = {}): CliOptions => ({
    configPath,
    sourceType: 'postgresql',
    targetType: 'postgresql',
    probe: { maxRetries: 1, delaySeconds: 0 },
    artifactDir: dir,
    runId: 'run-1',
    verify: false,
    ...overrides,
  });

  describe('runCommand', () => {
    it('stops on a missing section before any readiness check', async () => {
      fs.writeFileSync(configPath, FULL_CONFIG.replace('[destination_postgres]', '[destination_db]'));
      const check = checkByHost({ source_postgres: ready, destination_postgres: ready });
      const { banner, start } = createBanner();

      const error = await runCommand(buildOptions(), { check, banner, logger: createRecordingLogger() }).catch(
        (err: unknown) => err
      );

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ kind: 'missing-section', section: 'destination_postgres' });
      expect(check).not.toHaveBeenCalled();
      expect(start).not.toHaveBeenCalled();
    });

    it('runs the pipeline and reports the summary', async () => {
      fs.writeFileSync(configPath, FULL_CONFIG);
      const extract = jest.fn<Promise<void>, [ConnectionConfig, string]>(async (_config, artifactPath) => {
        fs.writeFileSync(artifactPath, '-- dump\n');
      });
      const load = jest.fn<Promise<void>, [ConnectionConfig, string]>(async () => undefined);
      const source: SourceDialect = { name: 'fake-source', extract };
      const target: TargetDialect = { name: 'fake-target', load };
      const { banner, start, summary } = createBanner();
      const artifactPath = path.join(path.resolve(dir), 'elt-run-1.sql');

      const exitCode = await runCommand(buildOptions(), {
        check: checkByHost({ source_postgres: ready, destination_postgres: ready }),
        source,
        target,
        banner,
        logger: createRecordingLogger(),
      });

      expect(exitCode).toBe(0);
      expect(start).toHaveBeenCalledWith({
        runId: 'run-1',
        sourceHost: 'source_postgres',
        destinationHost: 'destination_postgres',
        artifactPath,
      });
      expect(summary).toHaveBeenCalledWith(
        expect.objectContaining({ completed: true, state: 'DONE', failedStage: undefined, artifactPath })
      );
      expect(load).toHaveBeenCalledWith(expect.objectContaining({ host: 'destination_postgres' }), artifactPath);
    });
  });

  describe('probeCommand', () => {
    it('exits 0 when both servers accept connections', async () => {
      fs.writeFileSync(configPath, FULL_CONFIG);
      const check = checkByHost({ source_postgres: ready, destination_postgres: ready });

      const exitCode = await probeCommand(buildOptions(), { check, logger: createRecordingLogger() });

      expect(exitCode).toBe(0);
      expect(check.mock.calls).toEqual([
        ['source_postgres', undefined],
        ['destination_postgres', undefined],
      ]);
    });

    it('exits 1 when the destination stays down', async () => {
      fs.writeFileSync(configPath, FULL_CONFIG);
      const logger = createRecordingLogger();

      const exitCode = await probeCommand(buildOptions(), {
        check: checkByHost({ source_postgres: ready }),
        sleep: jest.fn(async () => undefined),
        logger,
      });

      expect(exitCode).toBe(1);
      expect(logger.messages('error')).toContain(
        'PostgreSQL server destination_postgres is not available after 1 retries'
      );
    });

    it('stops on a missing section before any readiness check', async () => {
      fs.writeFileSync(configPath, FULL_CONFIG.replace('[source_postgres]', '[source_db]'));
      const check = checkByHost({});

      await expect(probeCommand(buildOptions(), { check })).rejects.toThrow(ConfigurationError);
      expect(check).not.toHaveBeenCalled();
    });
  });
});

describe('reportFatalError', () => {
  it('logs the error on one line and maps it to exit code 1', () => {
    const logger = createRecordingLogger();
    const error = new ConfigurationError('missing-section', 'source_postgres section not found in config.ini', {
      section: 'source_postgres',
    });

    expect(reportFatalError(error, logger)).toBe(1);
    expect(logger.messages('error')).toEqual(['Fatal error: source_postgres section not found in config.ini']);
  });

  it('renders values that are not errors', () => {
    const logger = createRecordingLogger();

    reportFatalError('boom\nsecond line', logger);

    expect(logger.messages('error')).toEqual(['Fatal error: boom']);
  });
});
