export type PuzzleInputErrorCode = 'box-clash' | 'length';

export interface PuzzleInputErrorOptions {
  readonly actualLength?: number;
  readonly code: PuzzleInputErrorCode;
}

/**
 * Raised when a puzzle string cannot be turned into a 9x9 grid, before any solving starts.
 */
export class PuzzleInputError extends Error {
  public readonly actualLength: number | undefined;
  public readonly code: PuzzleInputErrorCode;

  public constructor(message: string, options: PuzzleInputErrorOptions) {
    super(message);
    this.name = 'PuzzleInputError';
    this.code = options.code;
    this.actualLength = options.actualLength;
  }
}
