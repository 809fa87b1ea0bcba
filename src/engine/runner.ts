import type { PipelineState, ReadinessCheck, RunnerConfig, RunResult, Sleep } from './types';
import type { SourceDialect } from '../dialects/source';
import type { TargetDialect } from '../dialects/target';
import type { CommandExecutor } from './command';
import { log, formatError, type Logger } from './logger';
import { waitForAvailable, createPgIsReadyCheck } from './probe';
import { getArtifactPath, ensureArtifactDir, artifactExists } from './artifact';
import { verifyTransfer, countPublicTables, type TableCounter } from './verify';
import { AvailabilityTimeout, ExtractFailure } from './errors';
import { createSource } from '../dialects/source-registry';
import { createTarget } from '../dialects/target-registry';

// Import dialects to register them
import '../dialects/source/postgresql';
import '../dialects/target/postgresql';

/**
 * Collaborators of a run. Everything defaults to the real implementation.
 */
export type RunnerDeps = {
  logger?: Logger;
  execute?: CommandExecutor;
  check?: ReadinessCheck;
  sleep?: Sleep;
  source?: SourceDialect;
  target?: TargetDialect;
  countTables?: TableCounter;
};

const STAGE_MESSAGES: Record<PipelineState, string> = {
  INIT: 'Starting',
  PROBE_SOURCE: 'Waiting for source server',
  PROBE_DEST: 'Waiting for destination server',
  CONFIGURED: 'Running ELT pipeline...',
  EXTRACTING: 'Dumping source database',
  LOADING: 'Loading dump into destination database',
  VERIFYING: 'Verifying destination tables',
  DONE: 'Finished',
  FAILED: 'Pipeline aborted',
};

/**
 * Probe both servers, dump the source, load the dump into the destination.
 *
 * Stage failures are logged and turned into exit code 1; nothing after a failed stage runs.
 * Errors thrown while building the run (unknown dialect, bad run id) are not caught here.
 */
export const runPipeline = async (config: RunnerConfig, deps: RunnerDeps = {}): Promise<RunResult> => {
  const startTime = Date.now();
  const logger = deps.logger ?? log;
  const { source: sourceConfig, destination: destinationConfig } = config.connections;

  const artifactPath = getArtifactPath(config.artifactDir, config.runId);
  const dialectOptions = { execute: deps.execute, logger };
  const source = deps.source ?? createSource(config.sourceType, dialectOptions);
  const target = deps.target ?? createTarget(config.targetType, dialectOptions);
  const check = deps.check ?? createPgIsReadyCheck(deps.execute);

  let state: PipelineState = 'INIT';

  const transition = (to: PipelineState): void => {
    config.hooks?.onTransition?.({ from: state, to });
    state = to;
    logger.stage(to, STAGE_MESSAGES[to]);
  };

  const finish = (exitCode: 0 | 1, failedStage?: PipelineState): RunResult => {
    const elapsedMs = Date.now() - startTime;
    config.hooks?.onComplete?.({ exitCode, state, elapsedMs });
    return { exitCode, state, failedStage, artifactPath, elapsedMs };
  };

  const fail = (message: string): RunResult => {
    const failedStage = state;
    logger.error(message);
    transition('FAILED');
    return finish(1, failedStage);
  };

  const probe = (host: string, port: number | undefined): Promise<boolean> =>
    waitForAvailable(host, { ...config.probe, port, check, sleep: deps.sleep, logger });

  // 1. Source liveness
  transition('PROBE_SOURCE');
  if (!(await probe(sourceConfig.host, sourceConfig.port))) {
    return fail(`Source ${new AvailabilityTimeout(sourceConfig.host, config.probe.maxRetries).message}`);
  }

  // 2. Destination liveness
  transition('PROBE_DEST');
  if (!(await probe(destinationConfig.host, destinationConfig.port))) {
    return fail(`Destination ${new AvailabilityTimeout(destinationConfig.host, config.probe.maxRetries).message}`);
  }

  transition('CONFIGURED');

  // 3. Extract
  transition('EXTRACTING');
  try {
    ensureArtifactDir(config.artifactDir);
    await source.extract(sourceConfig, artifactPath);
    if (!artifactExists(artifactPath)) {
      throw new ExtractFailure(`${source.name} reported success but ${artifactPath} does not exist`);
    }
  } catch (err) {
    return fail(`Failed to dump data: ${formatError(err)}`);
  }

  // 4. Load
  transition('LOADING');
  try {
    await target.load(destinationConfig, artifactPath);
  } catch (err) {
    return fail(`Failed to load data: ${formatError(err)}`);
  }

  // 5. Optional verification
  if (config.verify) {
    transition('VERIFYING');
    try {
      await verifyTransfer(config.connections, deps.countTables ?? countPublicTables, logger);
    } catch (err) {
      return fail(`Failed to verify data: ${formatError(err)}`);
    }
  }

  transition('DONE');
  logger.success('ELT pipeline completed');
  return finish(0);
};
