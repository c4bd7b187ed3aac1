// Errors raised by the decision engine. All are thrown synchronously at the
// point of detection and never retried.

export class NotFoundError extends Error {
  constructor(
    message: string,
    public readonly key: string
  ) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class InvalidConfigError extends Error {
  constructor(
    message: string,
    public readonly parameter: string
  ) {
    super(message);
    this.name = 'InvalidConfigError';
  }
}

export class EmptyInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmptyInputError';
  }
}
