/**
 * Connection parameters for one side of the transfer.
 * Built once by the config provider and never mutated afterwards.
 */
export type ConnectionConfig = Readonly<{
  dbname: string;
  user: string;
  password: string;
  host: string;
  /** Falls back to the client tools' own default (5432) when absent */
  port?: number;
}>;

export type ConnectionPair = Readonly<{
  source: ConnectionConfig;
  destination: ConnectionConfig;
}>;

export type PipelineState =
  | 'INIT'
  | 'PROBE_SOURCE'
  | 'PROBE_DEST'
  | 'CONFIGURED'
  | 'EXTRACTING'
  | 'LOADING'
  | 'VERIFYING'
  | 'DONE'
  | 'FAILED';

/**
 * Outcome of one readiness check invocation (e.g. pg_isready).
 */
export type ReadinessCheckResult = {
  exitCode: number;
  stdout: string;
};

export type ReadinessCheck = (host: string, port?: number) => Promise<ReadinessCheckResult>;

export type Sleep = (ms: number) => Promise<void>;

export type ProbeOptions = {
  maxRetries: number;
  delaySeconds: number;
};

/**
 * Lifecycle hooks for monitoring a run.
 */
export type PipelineHooks = {
  /** Called on every state change, FAILED included */
  onTransition?: (params: { from: PipelineState; to: PipelineState }) => void;

  /** Called once when the run settles (success or failure) */
  onComplete?: (params: { exitCode: number; state: PipelineState; elapsedMs: number }) => void;
};

export type RunnerConfig = {
  connections: ConnectionPair;
  /** Source dialect type, resolved through the source registry */
  sourceType: string;
  /** Target dialect type, resolved through the target registry */
  targetType: string;
  probe: ProbeOptions;
  artifactDir: string;
  runId: string;
  verify: boolean;
  hooks?: PipelineHooks;
};

export type RunResult = {
  exitCode: 0 | 1;
  state: PipelineState;
  failedStage?: PipelineState;
  artifactPath: string;
  elapsedMs: number;
};
