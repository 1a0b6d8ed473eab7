/**
 * A handle created on first use. Concurrent callers share one creation;
 * a failed creation is forgotten so the next caller tries again.
 */
export class LazyResource<T> {
  private value: T | undefined;
  private pending: Promise<T> | undefined;

  constructor(private readonly create: () => Promise<T>) {}

  get isReady(): boolean {
    return this.value !== undefined;
  }

  get(): Promise<T> {
    if (this.value !== undefined) {
      return Promise.resolve(this.value);
    }
    this.pending ??= this.create().then(
      (value) => {
        this.value = value;
        this.pending = undefined;
        return value;
      },
      (error: unknown) => {
        this.pending = undefined;
        throw error;
      }
    );
    return this.pending;
  }

  /** Starts creation in the background; failures go to `onError` instead of rejecting. */
  warmUp(onError: (error: unknown) => void): void {
    this.get().then(
      () => undefined,
      (error: unknown) => onError(error)
    );
  }
}
