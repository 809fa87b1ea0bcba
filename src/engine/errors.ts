export class EltError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type ConfigurationErrorKind = 'missing-section' | 'missing-key' | 'invalid-value' | 'unreadable';

export class ConfigurationError extends EltError {
  readonly kind: ConfigurationErrorKind;
  readonly section?: string;
  readonly key?: string;

  constructor(
    kind: ConfigurationErrorKind,
    message: string,
    details: { section?: string; key?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.kind = kind;
    this.section = details.section;
    this.key = details.key;
  }
}

/**
 * A single failed readiness check. Absorbed by the prober's retry loop.
 */
export class ProbeFailure extends EltError {
  constructor(
    readonly host: string,
    readonly attempt: number,
    reason: string,
    cause?: unknown
  ) {
    super(`${host} is not available (attempt ${attempt}): ${reason}`, { cause });
  }
}

export class AvailabilityTimeout extends EltError {
  constructor(
    readonly host: string,
    readonly attempts: number
  ) {
    super(`${host} is not available after ${attempts} retries`);
  }
}

const describeCommandFailure = (command: string, exitCode: number | null, stderr: string): string => {
  const tail = stderr.trim().split('\n').slice(-3).join(' | ');
  const status = exitCode === null ? 'could not be started' : `exited with code ${exitCode}`;
  return tail ? `${command} ${status}: ${tail}` : `${command} ${status}`;
};

export class CommandFailedError extends EltError {
  constructor(
    readonly command: string,
    readonly exitCode: number | null,
    readonly stderr: string,
    cause?: unknown
  ) {
    super(describeCommandFailure(command, exitCode, stderr), { cause });
  }
}

export class ExtractFailure extends EltError {}

export class LoadFailure extends EltError {}

export class VerificationFailure extends EltError {}
