import type { Logger } from '../engine/logger';
import type { PipelineState } from '../engine/types';

export type LogEntry = {
  level: 'info' | 'success' | 'warn' | 'error' | 'stage';
  message: string;
  state?: PipelineState;
};

export type RecordingLogger = Logger & {
  entries: LogEntry[];
  messages: (level?: LogEntry['level']) => string[];
};

export const createRecordingLogger = (): RecordingLogger => {
  const entries: LogEntry[] = [];

  return {
    entries,
    info: (message) => entries.push({ level: 'info', message }),
    success: (message) => entries.push({ level: 'success', message }),
    warn: (message) => entries.push({ level: 'warn', message }),
    error: (message) => entries.push({ level: 'error', message }),
    stage: (state, message) => entries.push({ level: 'stage', message, state }),
    messages: (level) => entries.filter((e) => level === undefined || e.level === level).map((e) => e.message),
  };
};
