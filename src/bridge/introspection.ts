import { IntrospectionFailure, WorkerStoppedError } from './errors.js';
import type { WaitOptions } from '../shared/protocol.js';
import { Waiter, removeWaiter } from '../utils/waiter.js';

export type Query<TState, TResult> = (state: Readonly<TState>) => TResult;

interface IntrospectionTask<TState> {
  run: (state: Readonly<TState>) => void;
  fail: (error: Error) => void;
}

export interface IntrospectionStats {
  pending: number;
  serviced: number;
  failed: number;
}

// Results leave the worker as structured clones.
export class IntrospectionBridge<TState> {
  private readonly tasks: IntrospectionTask<TState>[] = [];
  private readonly watchers: Waiter<void>[] = [];
  private stopReason: Error | null = null;
  private serviced = 0;
  private failed = 0;

  call<TResult>(query: Query<TState, TResult>, options: WaitOptions = {}): Promise<TResult> {
    if (options.signal?.aborted) return Promise.reject(options.signal.reason);
    if (this.stopReason) return Promise.reject(this.stopReason);

    const task: IntrospectionTask<TState> = {
      run: (state) => {
        let result: TResult;
        try {
          result = query(state);
        } catch (error) {
          this.failed += 1;
          waiter.reject(error);
          return;
        }

        try {
          waiter.resolve(structuredClone(result));
        } catch (error) {
          this.failed += 1;
          waiter.reject(new IntrospectionFailure('query result is not plain data', { cause: error }));
        }
      },
      fail: (error) => waiter.reject(error),
    };
    const waiter = new Waiter<TResult>(options.signal, () => removeWaiter(this.tasks, task));

    this.tasks.push(task);
    for (const watcher of this.watchers.splice(0)) {
      watcher.resolve();
    }
    return waiter.promise;
  }

  pending() {
    return this.tasks.length;
  }

  stats(): IntrospectionStats {
    return { pending: this.tasks.length, serviced: this.serviced, failed: this.failed };
  }

  drain(state: Readonly<TState>): number {
    let count = 0;
    for (let task = this.tasks.shift(); task; task = this.tasks.shift()) {
      task.run(state);
      count += 1;
    }
    this.serviced += count;
    return count;
  }

  whenPending(options: WaitOptions = {}): Promise<void> {
    if (options.signal?.aborted) return Promise.reject(options.signal.reason);
    if (this.tasks.length > 0 || this.stopReason) return Promise.resolve();

    const watcher: Waiter<void> = new Waiter<void>(options.signal, () => removeWaiter(this.watchers, watcher));
    this.watchers.push(watcher);
    return watcher.promise;
  }

  shutdown(reason: Error = new WorkerStoppedError()) {
    if (this.stopReason) return;
    this.stopReason = reason;
    for (const task of this.tasks.splice(0)) {
      task.fail(reason);
    }
    for (const watcher of this.watchers.splice(0)) {
      watcher.resolve();
    }
  }
}
