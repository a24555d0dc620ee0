export type HmsErrorCode =
  | 'hms/not-found'
  | 'hms/incomplete-secret'
  | 'hms/secret-reuse'
  | 'hms/invalid-input'
  | 'hms/remote-unreachable'
  | 'hms/command-failed'
  | 'hms/command-timeout'
  | 'hms/unit-file-format'
  | 'hms/confirmation-required'
  | 'hms/deployment-locked'
  | 'hms/config';

/**
 * Base class for every failure the tool knows how to describe.
 * `exitCode` is what the CLI exits with when the error reaches the top level.
 */
export class HmsError extends Error {
  readonly code: HmsErrorCode;
  readonly exitCode: number;

  constructor(code: HmsErrorCode, message: string, exitCode = 1) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
  }
}

export class NotFoundError extends HmsError {
  constructor(message: string) {
    super('hms/not-found', message, 3);
  }
}

export class IncompleteSecretError extends HmsError {
  readonly missingFields: string[];

  constructor(target: string, missingFields: string[]) {
    super('hms/incomplete-secret', `Incomplete secrets for ${target}: missing ${missingFields.join(', ')}`, 2);
    this.missingFields = missingFields;
  }
}

export class SecretReuseError extends HmsError {
  constructor(appKey: string, field: string, otherAppKey: string) {
    super('hms/secret-reuse', `Refusing to set ${field} for ${appKey}: value is already used by ${otherAppKey}`, 2);
  }
}

export class InvalidInputError extends HmsError {
  constructor(message: string) {
    super('hms/invalid-input', message, 2);
  }
}

export class ConfigError extends HmsError {
  constructor(message: string) {
    super('hms/config', message, 2);
  }
}

export class RemoteUnreachableError extends HmsError {
  constructor(target: string, detail: string) {
    super('hms/remote-unreachable', `Cannot reach ${target}: ${detail}`, 5);
  }
}

export class CommandFailedError extends HmsError {
  readonly command: string;
  readonly commandExitCode: number;
  readonly stderr: string;

  constructor(command: string, commandExitCode: number, stderr: string) {
    super('hms/command-failed', `\`${command}\` exited with code ${commandExitCode}${stderr ? `: ${excerpt(stderr)}` : ''}`);
    this.command = command;
    this.commandExitCode = commandExitCode;
    this.stderr = stderr;
  }
}

export class CommandTimeoutError extends HmsError {
  constructor(command: string, timeoutMs: number) {
    super(
      'hms/command-timeout',
      `\`${command}\` timed out after ${timeoutMs}ms; the remote outcome is unknown, verify with health-check before redeploying`,
      6,
    );
  }
}

export class UnitFileFormatError extends HmsError {
  constructor(path: string, detail: string) {
    super('hms/unit-file-format', `${path}: ${detail}`);
  }
}

export class ConfirmationRequiredError extends HmsError {
  constructor(appKey: string) {
    super('hms/confirmation-required', `Decommissioning ${appKey} is irreversible; re-run with --force to confirm`, 2);
  }
}

export class DeploymentLockedError extends HmsError {
  constructor(appKey: string, holder: string, acquiredAt: string) {
    super(
      'hms/deployment-locked',
      `${appKey} is locked by ${holder} since ${acquiredAt}; run \`hms unlock --app ${appKey}\` if that run is gone`,
      4,
    );
  }
}

// Last lines of a command's stderr, enough to see why it failed.
export function excerpt(text: string, maxLines = 12, maxChars = 2000): string {
  const lines = text.trim().split('\n');
  const tail = lines.slice(-maxLines).join('\n');
  return tail.length > maxChars ? tail.slice(tail.length - maxChars) : tail;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
