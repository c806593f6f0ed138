import { describe, it, expect, vi } from 'vitest';

import { startTask, type TaskOutcome } from '../tasks';

function settled<T>(handle: { onSettled(cb: (o: TaskOutcome<T>) => void): void }): Promise<TaskOutcome<T>> {
  return new Promise((resolve) => handle.onSettled(resolve));
}

describe('startTask', () => {
  it('resolves with the work value and reports success', async () => {
    const handle = startTask(async () => 42);
    expect(handle.state).toBe('running');

    await expect(handle.promise).resolves.toBe(42);
    expect(await settled(handle)).toEqual({ status: 'succeeded', value: 42 });
    expect(handle.state).toBe('succeeded');
  });

  it('reports failures to callbacks and rejects the promise', async () => {
    const error = new Error('boom');
    const handle = startTask(async () => {
      throw error;
    });

    await expect(handle.promise).rejects.toBe(error);
    expect(await settled(handle)).toEqual({ status: 'failed', error });
    expect(handle.state).toBe('failed');
  });

  it('lets the work observe cancellation through its signal', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const handle = startTask(
      async (signal) => {
        await gate;
        return signal.aborted ? 'stopped' : 'finished';
      },
      (value) => value === 'stopped'
    );

    handle.cancel();
    release();

    await expect(handle.promise).resolves.toBe('stopped');
    expect(await settled(handle)).toEqual({ status: 'cancelled', value: 'stopped' });
    expect(handle.signal.aborted).toBe(true);
  });

  it('reports success when the work finished everything despite a late cancel', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const handle = startTask(
      async () => {
        await gate;
        return { done: 3, cancelled: false };
      },
      (value) => value.cancelled
    );

    handle.cancel();
    release();

    expect(await settled(handle)).toEqual({ status: 'succeeded', value: { done: 3, cancelled: false } });
    expect(handle.state).toBe('succeeded');
    expect(handle.signal.aborted).toBe(true);
  });

  it('treats work that ignores its signal as succeeded', async () => {
    const handle = startTask(async () => 'written');
    handle.cancel();

    expect(await settled(handle)).toEqual({ status: 'succeeded', value: 'written' });
  });

  it('ignores cancel after the task has settled', async () => {
    const handle = startTask(async () => 'done');
    await settled(handle);
    handle.cancel();
    expect(handle.signal.aborted).toBe(false);
    expect(handle.state).toBe('succeeded');
  });

  it('calls late callbacks immediately with the stored outcome', async () => {
    const handle = startTask(async () => 'done');
    await settled(handle);

    const callback = vi.fn();
    handle.onSettled(callback);
    expect(callback).toHaveBeenCalledWith({ status: 'succeeded', value: 'done' });
  });

  it('keeps notifying when one callback throws', async () => {
    const handle = startTask(async () => 1);
    const second = vi.fn();
    handle.onSettled(() => {
      throw new Error('callback failure');
    });
    handle.onSettled(second);

    await settled(handle);
    expect(second).toHaveBeenCalledTimes(1);
  });
});
