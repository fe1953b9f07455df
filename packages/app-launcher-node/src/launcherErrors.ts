export class LauncherError extends Error {
  readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'LauncherError';
    this.cause = cause;
    Object.setPrototypeOf(this, LauncherError.prototype);
  }

  public toErrorPlainObject() {
    return {
      name: this.name,
      message: this.message,
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

export class LauncherConfigurationError extends LauncherError {
  constructor(message: string) {
    super(message);
    this.name = 'LauncherConfigurationError';
    Object.setPrototypeOf(this, LauncherConfigurationError.prototype);
  }
}
