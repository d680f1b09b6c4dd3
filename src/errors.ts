/**
 * Error types raised by vmkit.
 *
 * Every failure a command can hit maps to one of these classes; the CLI
 * catches them at the outermost scope and prints the message.
 */

/** No credential could be resolved from any source. */
export class CredentialNotFoundError extends Error {
  public readonly attempted: string[];

  constructor(attempted: string[]) {
    const where = attempted.length > 0 ? attempted.join(', ') : '(no location)';
    super(`No credential found (tried: ${where})`);
    this.name = 'CredentialNotFoundError';
    this.attempted = attempted;
  }
}

/** A stored credential exists but cannot be read, parsed or decrypted. */
export class CredentialFileError extends Error {
  public readonly location: string;

  constructor(location: string, reason: string) {
    super(`Invalid stored credential at ${location}: ${reason}`);
    this.name = 'CredentialFileError';
    this.location = location;
  }
}

/** A mandatory session value was neither supplied nor cached. */
export class SessionValueMissingError extends Error {
  public readonly key: string;

  constructor(key: string) {
    super(`No value given for '${key}' and none cached in this session`);
    this.name = 'SessionValueMissingError';
    this.key = key;
  }
}

/** DNS, TLS, socket or timeout failure before a response was received. */
export class ConnectionError extends Error {
  public readonly url: string;

  constructor(url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Connection to ${url} failed: ${reason}`, { cause });
    this.name = 'ConnectionError';
    this.url = url;
  }
}

/** The server answered with a non-2xx status. */
export class ApiError extends Error {
  public readonly status: number;
  public readonly body: string;

  constructor(method: string, url: string, status: number, body: string) {
    super(`${method} ${url} failed with status ${status}: ${body}`);
    this.name = 'ApiError';
    this.status = status;
    this.body = body;
  }
}

/** Response content is not valid XML/JSON or does not have the expected shape. */
export class ParseError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ParseError';
  }
}

/** A polled task did not reach a terminal state before the deadline. */
export class TaskTimeoutError extends Error {
  public readonly timeoutMs: number;
  public readonly lastStatus: string | null;

  constructor(timeoutMs: number, lastStatus: string | null) {
    super(
      `Task did not finish within ${timeoutMs}ms (last status: ${lastStatus ?? 'unknown'})`,
    );
    this.name = 'TaskTimeoutError';
    this.timeoutMs = timeoutMs;
    this.lastStatus = lastStatus;
  }
}

/** The terraform binary exited with a non-zero code. */
export class TerraformError extends Error {
  public readonly exitCode: number | null;
  public readonly stderr: string;

  constructor(command: string, exitCode: number | null, stderr: string) {
    super(`terraform ${command} failed (code ${exitCode ?? 'unknown'}): ${stderr.trim()}`);
    this.name = 'TerraformError';
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/** A configuration value is present but invalid. */
export class ConfigError extends Error {
  public readonly key: string;

  constructor(key: string, reason: string) {
    super(`Invalid config value for "${key}": ${reason}`);
    this.name = 'ConfigError';
    this.key = key;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
