export class LogicError extends Error {
  public constructor(message?: string) {
    super(message);
    this.name = 'LogicError';
  }
}
