/**
 * Raised when a duration text cannot be parsed.
 */
export class ParseError extends Error {
  public readonly input: string;

  public constructor(message: string, input: string) {
    super(message);
    this.name = 'ParseError';
    this.input = input;
  }
}
