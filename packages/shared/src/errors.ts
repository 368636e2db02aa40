export class QuotingError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidCharacterError extends QuotingError {
  constructor(value: string) {
    super(
      `Expected a single character, got ${JSON.stringify(value)}`,
      "INVALID_CHARACTER",
    );
  }
}
