import type { PipelineState } from './types';

type AnsiColor = {
  reset: string;
  dim: string;
  bold: string;
  red: string;
  green: string;
  yellow: string;
  blue: string;
  cyan: string;
  magenta: string;
};

const COLORS: Readonly<AnsiColor> = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
};

const STATE_COLORS: Record<PipelineState, string> = {
  INIT: COLORS.dim,
  PROBE_SOURCE: COLORS.blue,
  PROBE_DEST: COLORS.cyan,
  CONFIGURED: COLORS.dim,
  EXTRACTING: COLORS.magenta,
  LOADING: COLORS.yellow,
  VERIFYING: COLORS.blue,
  DONE: COLORS.green,
  FAILED: COLORS.red,
};

const pad = (n: number, len = 2): string => String(n).padStart(len, '0');

const timestamp = (): string => {
  const d = new Date();
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
};

export const formatElapsed = (elapsedMs: number): string => {
  if (elapsedMs < 60_000) {
    return `${(elapsedMs / 1000).toFixed(1)}s`;
  }

  const minutes = Math.floor(elapsedMs / 60_000);
  const seconds = Math.round((elapsedMs % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
};

/**
 * Leveled logging sink handed to every component.
 * `log` below is the process-wide console implementation; tests pass a recording one.
 */
export type Logger = {
  info: (message: string) => void;
  success: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  stage: (state: PipelineState, message: string) => void;
};

export type PipelineSummary = {
  completed: boolean;
  state: PipelineState;
  artifactPath: string;
  elapsedMs: number;
  failedStage?: PipelineState;
};

export const log = {
  info: (message: string) => {
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${message}`);
  },

  success: (message: string) => {
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.green}${message}${COLORS.reset}`);
  },

  warn: (message: string) => {
    console.warn(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.yellow}WARN${COLORS.reset}  ${message}`);
  },

  error: (message: string) => {
    console.error(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.red}ERR${COLORS.reset}   ${message}`);
  },

  stage: (state: PipelineState, message: string) => {
    const tag = `${STATE_COLORS[state]}${state.toLowerCase()}${COLORS.reset}`;
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${tag}  ${message}`);
  },

  pipeline: {
    start: (config: { runId: string; sourceHost: string; destinationHost: string; artifactPath: string }) => {
      const lines = [
        '',
        `${COLORS.bold}ELT pipeline started${COLORS.reset}`,
        `  run id:       ${config.runId}`,
        `  source:       ${config.sourceHost}`,
        `  destination:  ${config.destinationHost}`,
        `  artifact:     ${config.artifactPath}`,
        '',
      ];
      console.info(lines.join('\n'));
    },

    summary: (stats: PipelineSummary) => {
      const status = (() => {
        if (stats.completed) {
          return `${COLORS.green}${COLORS.bold}COMPLETED${COLORS.reset}`;
        }

        return `${COLORS.red}${COLORS.bold}FAILED${COLORS.reset}`;
      })();

      const lines = [
        '',
        `${COLORS.dim}${'─'.repeat(50)}${COLORS.reset}`,
        `  ${status}  ${COLORS.dim}(${formatElapsed(stats.elapsedMs)})${COLORS.reset}`,
        '',
        `  final state:  ${stats.state}`,
      ];

      if (stats.failedStage) {
        lines.push(`  failed in:    ${COLORS.red}${stats.failedStage}${COLORS.reset}`);
      }

      lines.push(`  artifact:     ${stats.artifactPath}`, `${COLORS.dim}${'─'.repeat(50)}${COLORS.reset}`, '');
      console.info(lines.join('\n'));
    },
  },
};

interface PgError {
  severity?: string;
  code?: string;
  detail?: string;
  hint?: string;
  message?: string;
}

const isPgError = (err: unknown): err is PgError =>
  err !== null && typeof err === 'object' && 'severity' in err && 'code' in err;

/**
 * One-line rendering of anything thrown, for log lines.
 */
export const formatError = (err: unknown): string => {
  if (isPgError(err)) {
    const fields = [err.message, err.code && `code=${err.code}`, err.detail, err.hint].filter(Boolean);
    return fields.join(' | ').slice(0, 200);
  }

  const msg = err instanceof Error ? err.message : String(err);
  return msg.split('\n')[0].slice(0, 200);
};
