export class PlayerLookupError extends Error {
  constructor(
    message: string,
    public readonly context: {
      missing?: number[];
    } = {}
  ) {
    super(message);
    this.name = 'PlayerLookupError';
  }
}

export class ConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

export class InvalidScopeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidScopeError';
  }
}
