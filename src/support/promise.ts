export class PromiseSource<T> {
  public promise: Promise<T>;
  public resolve!: (value: T | PromiseLike<T>) => void;

  public constructor() {
    this.promise = new Promise(resolve => {
      this.resolve = resolve;
    });
  }
}
