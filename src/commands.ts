import { readConfig, DEFAULT_CONFIG_PATH } from './config/read-config';
import { runPipeline, type RunnerDeps } from './engine/runner';
import { waitForAvailable, createPgIsReadyCheck, DEFAULT_PROBE_OPTIONS } from './engine/probe';
import { createRunId, getArtifactPath } from './engine/artifact';
import { ConfigurationError } from './engine/errors';
import { log, formatError, type Logger, type PipelineSummary } from './engine/logger';
import type { ProbeOptions, RunnerConfig } from './engine/types';

/** Raw option values as parseArgs hands them over */
export type CliValues = {
  config?: string;
  'max-retries'?: string;
  delay?: string;
  'artifact-dir'?: string;
  'run-id'?: string;
  'source-type'?: string;
  'target-type'?: string;
  verify?: boolean;
};

export type CliOptions = Omit<RunnerConfig, 'connections' | 'hooks'> & {
  configPath: string;
};

export type PipelineBanner = {
  start: (config: { runId: string; sourceHost: string; destinationHost: string; artifactPath: string }) => void;
  summary: (stats: PipelineSummary) => void;
};

export type CommandDeps = RunnerDeps & {
  banner?: PipelineBanner;
};

const INTEGER = /^\d+$/;

const parseRetries = (raw: string | undefined, flag: string): number | undefined => {
  if (raw === undefined || raw === '') return undefined;
  if (!INTEGER.test(raw.trim())) {
    throw new ConfigurationError('invalid-value', `${flag} must be a non-negative integer, got "${raw}"`);
  }
  return Number(raw);
};

const parseSeconds = (raw: string | undefined, flag: string): number | undefined => {
  if (raw === undefined || raw === '') return undefined;
  const parsed = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigurationError('invalid-value', `${flag} must be a non-negative number, got "${raw}"`);
  }
  return parsed;
};

/**
 * Merge flags, environment and defaults. Bad numbers fail here, before anything is read or started.
 */
export const resolveOptions = (values: CliValues, env: NodeJS.ProcessEnv = process.env): CliOptions => {
  const probe: ProbeOptions = {
    maxRetries:
      parseRetries(values['max-retries'] ?? env.PROBE_MAX_RETRIES, '--max-retries') ?? DEFAULT_PROBE_OPTIONS.maxRetries,
    delaySeconds:
      parseSeconds(values.delay ?? env.PROBE_DELAY_SECONDS, '--delay') ?? DEFAULT_PROBE_OPTIONS.delaySeconds,
  };

  return {
    configPath: values.config ?? env.ELT_CONFIG ?? DEFAULT_CONFIG_PATH,
    sourceType: values['source-type'] ?? 'postgresql',
    targetType: values['target-type'] ?? 'postgresql',
    probe,
    artifactDir: values['artifact-dir'] ?? env.ELT_ARTIFACT_DIR ?? process.cwd(),
    runId: values['run-id'] ?? createRunId(),
    verify: values.verify === true || env.ELT_VERIFY === 'true',
  };
};

/**
 * The `run` command. The config file is read before any server is contacted.
 */
export const runCommand = async (options: CliOptions, deps: CommandDeps = {}): Promise<number> => {
  const { configPath, ...rest } = options;
  const { banner = log.pipeline, ...runnerDeps } = deps;
  const config: RunnerConfig = { ...rest, connections: readConfig(configPath) };

  banner.start({
    runId: config.runId,
    sourceHost: config.connections.source.host,
    destinationHost: config.connections.destination.host,
    artifactPath: getArtifactPath(config.artifactDir, config.runId),
  });

  const result = await runPipeline(config, runnerDeps);

  banner.summary({
    completed: result.exitCode === 0,
    state: result.state,
    failedStage: result.failedStage,
    artifactPath: result.artifactPath,
    elapsedMs: result.elapsedMs,
  });

  return result.exitCode;
};

/**
 * The `probe` command: 0 when both servers accept connections.
 */
export const probeCommand = async (options: CliOptions, deps: CommandDeps = {}): Promise<number> => {
  const { source, destination } = readConfig(options.configPath);
  const wait = {
    ...options.probe,
    check: deps.check ?? createPgIsReadyCheck(deps.execute),
    sleep: deps.sleep,
    logger: deps.logger,
  };

  const sourceReady = await waitForAvailable(source.host, { ...wait, port: source.port });
  const destinationReady = await waitForAvailable(destination.host, { ...wait, port: destination.port });

  return sourceReady && destinationReady ? 0 : 1;
};

export const reportFatalError = (err: unknown, logger: Logger = log): 1 => {
  logger.error(`Fatal error: ${formatError(err)}`);
  return 1;
};
