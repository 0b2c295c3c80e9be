export enum ProvisionErrorCode {
  CONFIG_NOT_FOUND = 'CONFIG_NOT_FOUND',
  CONFIG_INVALID = 'CONFIG_INVALID',
  COMMAND_SPAWN_FAILED = 'COMMAND_SPAWN_FAILED',
  PROJECT_ROOT_UNAVAILABLE = 'PROJECT_ROOT_UNAVAILABLE',
}

export class ProvisionError extends Error {
  readonly code: ProvisionErrorCode;
  readonly context?: Record<string, unknown>;

  /** `options.cause` keeps the underlying error (a spawn or fs failure) reachable for logging. */
  constructor(code: ProvisionErrorCode, message: string, context?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ProvisionError';
    this.code = code;
    this.context = context;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
