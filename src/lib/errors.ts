export type ErrorCode = 'validation_error' | 'remote_call_failed';

export class AgentRegistryError extends Error {
  constructor(readonly code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Caller-contract violation, raised before any network call. */
export class ValidationError extends AgentRegistryError {
  constructor(message: string, readonly issues: string[] = []) {
    super('validation_error', message);
  }
}

export type RemoteOperation = 'login' | 'register' | 'verify' | 'health';

/** Network failure, non-2xx status, auth rejection or an unusable response body. */
export class RemoteCallError extends AgentRegistryError {
  constructor(
    readonly operation: RemoteOperation,
    message: string,
    readonly status?: number,
    cause?: unknown
  ) {
    super('remote_call_failed', `${operation} failed: ${message}`, { cause });
  }
}

export function isAgentRegistryError(err: unknown): err is AgentRegistryError {
  return err instanceof AgentRegistryError;
}
