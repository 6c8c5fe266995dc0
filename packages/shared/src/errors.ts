export class InvalidCardError extends Error {
  readonly rank: string;
  readonly suit: string;

  constructor(rank: string, suit: string) {
    super(`invalid card: rank=${JSON.stringify(rank)} suit=${JSON.stringify(suit)}`);
    this.name = "InvalidCardError";
    this.rank = rank;
    this.suit = suit;
  }
}

/** Raised for card sets no deal can produce: duplicates or too many cards. */
export class InvalidHandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidHandError";
  }
}

export class OracleUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OracleUnavailableError";
  }
}
