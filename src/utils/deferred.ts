/**
 * Promise with externally accessible settle functions.
 * Settling more than once is ignored; `settled` tells whether it happened.
 */
export class Deferred<T> {
  readonly promise: Promise<T>;
  private resolveFn: (value: T) => void = () => {};
  private rejectFn: (reason: Error) => void = () => {};
  private _settled = false;

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolveFn = resolve;
      this.rejectFn = reject;
    });
  }

  get settled(): boolean {
    return this._settled;
  }

  resolve(value: T): boolean {
    if (this._settled) return false;
    this._settled = true;
    this.resolveFn(value);
    return true;
  }

  reject(reason: Error): boolean {
    if (this._settled) return false;
    this._settled = true;
    this.rejectFn(reason);
    return true;
  }
}
