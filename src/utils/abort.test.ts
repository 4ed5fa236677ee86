import { describe, it, expect } from 'vitest';
import { raceAbort } from './abort.js';

describe('raceAbort', () => {
  it('should resolve with the promise value when not aborted', async () => {
    const controller = new AbortController();

    await expect(raceAbort(Promise.resolve(42), controller.signal)).resolves.toBe(42);
  });

  it('should pass through the promise rejection', async () => {
    const controller = new AbortController();

    await expect(raceAbort(Promise.reject(new Error('boom')), controller.signal)).rejects.toThrow(
      'boom'
    );
  });

  it('should reject at once for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    const error = await raceAbort(new Promise<number>(() => undefined), controller.signal).then(
      () => null,
      (reason: unknown) => reason
    );

    expect(error).toMatchObject({ name: 'AbortError' });
  });

  it('should reject with the abort reason while the promise is pending', async () => {
    const controller = new AbortController();
    const pending = raceAbort(new Promise<number>(() => undefined), controller.signal);

    controller.abort(new Error('shutting down'));

    await expect(pending).rejects.toThrow('shutting down');
  });
});
