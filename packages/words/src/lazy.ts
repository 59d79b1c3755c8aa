/**
 * One-time initialization cell.
 *
 * The initializer runs at most once. Callers after the first read the
 * published value directly. A failure is recorded and rethrown to every
 * later caller; the initializer is never retried.
 */

type CellState<T> =
  | { status: 'empty' }
  | { status: 'building' }
  | { status: 'ready'; value: T }
  | { status: 'failed'; error: unknown };

export class Lazy<T> {
  private state: CellState<T> = { status: 'empty' };

  constructor(private readonly init: () => T) {}

  /**
   * Get the value, running the initializer if this is the first call.
   *
   * @throws the initializer's error, on this and every later call
   * @throws Error if called again from inside the initializer
   */
  get(): T {
    const state = this.state;
    switch (state.status) {
      case 'ready':
        return state.value;
      case 'failed':
        throw state.error;
      case 'building':
        throw new Error('Lazy value requested while it is being initialized');
      case 'empty':
        return this.build();
    }
  }

  /**
   * Check if the value has been published.
   */
  isReady(): boolean {
    return this.state.status === 'ready';
  }

  /**
   * Check if the initializer ran and threw.
   */
  hasFailed(): boolean {
    return this.state.status === 'failed';
  }

  private build(): T {
    this.state = { status: 'building' };
    try {
      const value = this.init();
      this.state = { status: 'ready', value };
      return value;
    } catch (error) {
      this.state = { status: 'failed', error };
      throw error;
    }
  }
}
