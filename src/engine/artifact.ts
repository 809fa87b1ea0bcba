import fs from 'node:fs';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';

const RUN_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export const createRunId = (): string => uuidv4();

export const isValidRunId = (runId: string): boolean => RUN_ID_PATTERN.test(runId) && !runId.includes('..');

/**
 * Dump file for one run. Extract writes it, Load reads it, nothing deletes it.
 */
export const getArtifactPath = (artifactDir: string, runId: string): string => {
  if (!isValidRunId(runId)) {
    throw new Error(`Invalid run id "${runId}": use letters, digits, "-", "_" or "."`);
  }
  return path.join(path.resolve(artifactDir), `elt-${runId}.sql`);
};

export const ensureArtifactDir = (artifactDir: string): void => {
  fs.mkdirSync(artifactDir, { recursive: true });
};

export const artifactExists = (artifactPath: string): boolean => {
  if (!fs.existsSync(artifactPath)) return false;
  return fs.statSync(artifactPath).isFile();
};
