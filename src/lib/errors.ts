/**
 * Client-side errors raised by site-certs operations
 *
 * Each error carries a stable `code` and a coarse `type` so the CLI can decide
 * how to report it, plus a context record for debugging.
 */

/**
 * Base class for all site-certs errors
 */
export abstract class SiteCertsError extends Error {
  abstract readonly code: string;
  abstract readonly type: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * An external program (certbot, openssl, the reload command) failed
 */
export class ExternalCommandError extends SiteCertsError {
  readonly code = 'EXTERNAL_COMMAND_ERROR';
  readonly type = 'external-command';

  constructor(
    message: string,
    public readonly command: string,
    public readonly args: readonly string[],
    public readonly exitCode: number | null,
    public readonly stdout: string,
    /** stderr exactly as the program wrote it */
    public readonly rawStderr: Buffer,
  ) {
    super(message, { command, args: [...args], exitCode });
  }

  get stderr(): string {
    return this.rawStderr.toString('utf-8');
  }

  static failed(
    command: string,
    args: readonly string[],
    exitCode: number | null,
    stdout: string,
    stderr: Buffer | string,
  ): ExternalCommandError {
    const status = exitCode === null ? 'was terminated by a signal' : `exited with code ${exitCode}`;
    return new ExternalCommandError(
      `${command} ${status}`,
      command,
      args,
      exitCode,
      stdout,
      typeof stderr === 'string' ? Buffer.from(stderr, 'utf-8') : stderr,
    );
  }

  static spawnFailed(command: string, args: readonly string[], cause: Error): ExternalCommandError {
    return new ExternalCommandError(
      `Failed to start ${command}: ${cause.message}`,
      command,
      args,
      null,
      '',
      Buffer.alloc(0),
    );
  }
}

/**
 * The domain argument is not a hostname certbot can issue for
 */
export class InvalidDomainError extends SiteCertsError {
  readonly code = 'INVALID_DOMAIN';
  readonly type = 'validation';

  static invalid(domain: string, reason: string): InvalidDomainError {
    return new InvalidDomainError(`Invalid domain "${domain}": ${reason}`, { domain, reason });
  }
}

/**
 * An environment override could not be used
 */
export class ConfigurationError extends SiteCertsError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly type = 'configuration';

  static invalidValue(variable: string, reason: string): ConfigurationError {
    return new ConfigurationError(`Invalid value for ${variable}: ${reason}`, { variable, reason });
  }
}

export function isSiteCertsError(error: unknown): error is SiteCertsError {
  return error instanceof SiteCertsError;
}
