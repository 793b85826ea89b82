export class ProfileNotFoundError extends Error {
  readonly userId: string;

  constructor(userId: string) {
    super(`No profile stored for user_id '${userId}'`);
    this.name = 'ProfileNotFoundError';
    this.userId = userId;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
