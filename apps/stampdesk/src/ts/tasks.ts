/**
 * Task handles for long-running work (exports, page transforms).
 *
 * The caller owns the handle: it can await `promise`, register
 * `onSettled` callbacks for UI state transitions, and `cancel()`. Work
 * observes cancellation through its `AbortSignal` at the points where it is
 * safe to stop (between documents of a batch, never inside a pipeline).
 */

import { createLogger } from './logger';

const log = createLogger('Tasks');

export type TaskState = 'running' | 'succeeded' | 'failed' | 'cancelled';

export type TaskOutcome<T> =
  | { status: 'succeeded'; value: T }
  /** Work stopped early; `value` is whatever it had finished */
  | { status: 'cancelled'; value: T }
  | { status: 'failed'; error: unknown };

export interface TaskHandle<T> {
  /** Resolves with the work's value, rejects with its error */
  readonly promise: Promise<T>;
  readonly signal: AbortSignal;
  readonly state: TaskState;
  cancel(): void;
  /** Called once when the task settles; immediately if it already has */
  onSettled(callback: (outcome: TaskOutcome<T>) => void): void;
}

/**
 * Run `work` as a task. A task only counts as cancelled when
 * `stoppedEarly` says its value is partial; work that never looks at its
 * signal always settles as succeeded or failed.
 */
export function startTask<T>(
  work: (signal: AbortSignal) => Promise<T>,
  stoppedEarly: (value: T) => boolean = () => false
): TaskHandle<T> {
  const controller = new AbortController();
  const callbacks: Array<(outcome: TaskOutcome<T>) => void> = [];
  let state: TaskState = 'running';
  let outcome: TaskOutcome<T> | null = null;

  const notify = (callback: (outcome: TaskOutcome<T>) => void, settled: TaskOutcome<T>) => {
    try {
      callback(settled);
    } catch (error) {
      log.error('Task settle callback threw', error);
    }
  };

  const settle = (settled: TaskOutcome<T>) => {
    outcome = settled;
    state = settled.status;
    for (const callback of callbacks.splice(0)) notify(callback, settled);
  };

  // Start on a later tick so the caller can attach callbacks first
  const promise = Promise.resolve().then(() => work(controller.signal));

  void promise.then(
    (value) =>
      settle(
        stoppedEarly(value) ? { status: 'cancelled', value } : { status: 'succeeded', value }
      ),
    (error: unknown) => settle({ status: 'failed', error })
  );

  return {
    promise,
    signal: controller.signal,
    get state() {
      return state;
    },
    cancel() {
      if (state === 'running') controller.abort();
    },
    onSettled(callback) {
      if (outcome) {
        notify(callback, outcome);
      } else {
        callbacks.push(callback);
      }
    },
  };
}
