export class ConsulClientError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConsulClientError';
    Object.setPrototypeOf(this, ConsulClientError.prototype);
  }

  public toErrorPlainObject() {
    return {
      name: this.name,
      message: this.message,
      stack: this.stack,
    };
  }
}

export class ConsulRegistrationValidationError extends ConsulClientError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Invalid service registration: ${errors.join(', ')}`);
    this.name = 'ConsulRegistrationValidationError';
    this.errors = errors;
    Object.setPrototypeOf(this, ConsulRegistrationValidationError.prototype);
  }

  public toErrorPlainObject() {
    return {
      ...super.toErrorPlainObject(),
      errors: this.errors,
    };
  }
}

export class ConsulStatusError extends ConsulClientError {
  readonly statusCode: number;
  readonly responseBody: string;

  constructor(statusCode: number, responseBody: string) {
    super(responseBody || `Consul agent responded with status ${statusCode}`);
    this.name = 'ConsulStatusError';
    this.statusCode = statusCode;
    this.responseBody = responseBody;
    Object.setPrototypeOf(this, ConsulStatusError.prototype);
  }

  public toErrorPlainObject() {
    const partialResponseBody =
      this.responseBody.length > 100
        ? this.responseBody.slice(0, 50) + '...' + this.responseBody.slice(-50)
        : this.responseBody;
    return {
      ...super.toErrorPlainObject(),
      statusCode: this.statusCode,
      responseBody: partialResponseBody,
    };
  }
}

export class ConsulFetchError extends ConsulClientError {
  readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'ConsulFetchError';
    this.cause = cause;
    Object.setPrototypeOf(this, ConsulFetchError.prototype);
  }

  public toErrorPlainObject() {
    return {
      ...super.toErrorPlainObject(),
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}
