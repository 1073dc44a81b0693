export class NoRootInBracketError extends Error {
  readonly lower: number;
  readonly upper: number;

  constructor(lower: number, upper: number) {
    super(`No sign change between ${lower} and ${upper}`);
    this.name = 'NoRootInBracketError';
    this.lower = lower;
    this.upper = upper;
  }
}

/** The table artifact could not be read, decompressed or parsed. Fatal at startup. */
export class MalformedTableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedTableError';
  }
}

export class TableGenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TableGenerationError';
  }
}
