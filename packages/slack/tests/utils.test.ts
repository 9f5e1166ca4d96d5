import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../src/utils/keyed-mutex.js';
import { compareSlackTs } from '../src/utils/slack-ts.js';
import { createDeadline, raceAbort } from '../src/utils/deadline.js';
import { sessionIdFor } from '../src/utils/session-id.js';
import { OperationCancelledError } from '../src/types/errors.js';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe('KeyedMutex', () => {
  it('runs tasks for one key one at a time, in order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const slow = mutex.runExclusive('room', async () => {
      events.push('first:start');
      await tick();
      events.push('first:end');
    });
    const fast = mutex.runExclusive('room', async () => {
      events.push('second:start');
    });
    await Promise.all([slow, fast]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('does not make different keys wait on each other', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const a = mutex.runExclusive('a', async () => {
      events.push('a:start');
      await tick();
      events.push('a:end');
    });
    const b = mutex.runExclusive('b', async () => {
      events.push('b:start');
    });
    await Promise.all([a, b]);

    expect(events.indexOf('b:start')).toBeLessThan(events.indexOf('a:end'));
  });

  it('releases the key after a failing task', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('room', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(await mutex.runExclusive('room', () => 'next')).toBe('next');
    expect(mutex.activeKeys).toBe(0);
  });
});

describe('compareSlackTs', () => {
  it('orders by seconds, then by the fractional counter', () => {
    expect(compareSlackTs('1700000001.000001', '1700000000.999999')).toBe(1);
    expect(compareSlackTs('1700000000.000100', '1700000000.000200')).toBe(-1);
    expect(compareSlackTs('1700000000.0001', '1700000000.000100')).toBe(0);
  });

  it('does not lose precision that floats would', () => {
    expect(compareSlackTs('1700000000.0000001', '1700000000.0000002')).toBe(-1);
  });
});

describe('deadline', () => {
  it('rejects with the abort error once the signal fires', async () => {
    const controller = new AbortController();
    const never = new Promise<string>(() => undefined);
    const pending = raceAbort(never, controller.signal, () => new OperationCancelledError('stop'));

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(OperationCancelledError);
  });

  it('marks a deadline that fired on its own timer', async () => {
    const deadline = createDeadline(5);
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.timedOut).toBe(true);
    deadline.dispose();
  });

  it('follows the parent signal without marking a timeout', () => {
    const parent = new AbortController();
    const deadline = createDeadline(1000, parent.signal);

    parent.abort();

    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.timedOut).toBe(false);
    deadline.dispose();
  });
});

describe('sessionIdFor', () => {
  it('is stable per thread and differs between threads', () => {
    expect(sessionIdFor('C1', '1.1')).toBe(sessionIdFor('C1', '1.1'));
    expect(sessionIdFor('C1', '1.1')).not.toBe(sessionIdFor('C1', '2.2'));
    expect(sessionIdFor('C1')).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });
});
