/**
 * Error types shared by the manager and the proxy.
 *
 * `statusCode` is what the HTTP layer answers with when the error reaches it.
 */

export class RaygateError extends Error {
  public readonly statusCode: number;

  constructor(message: string, statusCode: number = 500) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/** A kubectl/helm invocation exited non-zero, timed out or failed to spawn. */
export class CommandError extends RaygateError {
  public readonly command: string[];
  public readonly exitCode: number;
  public readonly stderr: string;

  constructor(command: string[], exitCode: number, stderr: string) {
    super(stderr.trim() || `Command failed with code ${exitCode}: ${command.join(' ')}`, 500);
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class NotFoundError extends RaygateError {
  public readonly resourceType: string;
  public readonly resourceId?: string;

  constructor(resourceType: string, resourceId?: string, message?: string) {
    super(message || `${resourceType}${resourceId ? ` ${resourceId}` : ''} not found`, 404);
    this.resourceType = resourceType;
    this.resourceId = resourceId;
  }

  static cluster(name: string, message?: string): NotFoundError {
    return new NotFoundError('Cluster', name, message);
  }
}

/** Request input that failed validation. */
export class ValidationError extends RaygateError {
  constructor(message: string) {
    super(message, 400);
  }
}

/** Environment variable missing or malformed at startup. */
export class ConfigError extends RaygateError {
  constructor(message: string) {
    super(message, 500);
  }
}

/** A service the proxy depends on (manager or cluster head) failed or timed out. */
export class UpstreamError extends RaygateError {
  constructor(message: string, statusCode: 502 | 504 = 502) {
    super(message, statusCode);
  }
}
