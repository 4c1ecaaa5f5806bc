export type LazyState<T> =
  | { status: 'unresolved' }
  | { status: 'pending'; promise: Promise<T> }
  | { status: 'resolved'; value: T };

/**
 * Compute-once value. Concurrent callers of `get()` share the same in-flight
 * load, and once resolved the value never changes. A rejected load returns
 * the state to `unresolved`.
 */
export class Lazy<T> {
  private state: LazyState<T> = { status: 'unresolved' };

  constructor(private readonly load: () => Promise<T>) {}

  get status(): LazyState<T>['status'] {
    return this.state.status;
  }

  peek(): T | undefined {
    return this.state.status === 'resolved' ? this.state.value : undefined;
  }

  get(): Promise<T> {
    switch (this.state.status) {
      case 'resolved':
        return Promise.resolve(this.state.value);
      case 'pending':
        return this.state.promise;
      case 'unresolved': {
        const promise = this.load().then(
          (value) => {
            this.state = { status: 'resolved', value };
            return value;
          },
          (error: unknown) => {
            this.state = { status: 'unresolved' };
            throw error;
          }
        );
        this.state = { status: 'pending', promise };
        return promise;
      }
    }
  }
}
