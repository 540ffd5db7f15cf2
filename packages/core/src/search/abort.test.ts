import { SessionAbortedError } from '@docket/shared/src/utils/errors.js';
import { describeAbortReason, raceAbort, throwIfAborted, withDeadline } from './abort.js';

describe('abort helpers', () => {
  it('should describe an Error reason by its message', () => {
    const controller = new AbortController();
    controller.abort(new Error('client went away'));

    expect(describeAbortReason(controller.signal)).toBe('client went away');
  });

  it('should describe a string reason as is', () => {
    const controller = new AbortController();
    controller.abort('shutdown');

    expect(describeAbortReason(controller.signal)).toBe('shutdown');
  });

  it('should throw a SessionAbortedError from an aborted signal', () => {
    const controller = new AbortController();
    controller.abort('shutdown');

    expect(() => throwIfAborted(controller.signal)).toThrow(SessionAbortedError);
    expect(() => throwIfAborted(controller.signal)).toThrow('Session aborted: shutdown');
  });

  it('should not throw without a signal', () => {
    expect(() => throwIfAborted()).not.toThrow();
  });

  it('should pass through the promise value when not aborted', async () => {
    const controller = new AbortController();

    await expect(raceAbort(Promise.resolve(7), controller.signal)).resolves.toBe(7);
  });

  it('should reject as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const never = new Promise<number>(() => undefined);

    const raced = raceAbort(never, controller.signal);
    controller.abort('stop');

    await expect(raced).rejects.toThrow('Session aborted: stop');
  });

  it('should reject immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort('early');

    await expect(raceAbort(Promise.resolve(1), controller.signal)).rejects.toThrow('Session aborted: early');
  });

  it('should follow the caller signal through a deadline', () => {
    const controller = new AbortController();
    const combined = withDeadline(60_000, controller.signal);

    expect(combined.aborted).toBe(false);
    controller.abort('cancelled');
    expect(combined.aborted).toBe(true);
  });
});
