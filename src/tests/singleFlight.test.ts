import { SingleFlight } from '../broker/singleFlight';
import { deferred } from './helpers';

describe('SingleFlight', () => {
  test('concurrent callers for one key share a single operation', async () => {
    const flight = new SingleFlight<string>();
    const gate = deferred<string>();
    const operation = jest.fn(() => gate.promise);

    const callers = Array.from({ length: 5 }, () => flight.run('k', operation));
    expect(operation).toHaveBeenCalledTimes(1);
    expect(flight.isInFlight('k')).toBe(true);

    gate.resolve('shared');
    await expect(Promise.all(callers)).resolves.toEqual(['shared', 'shared', 'shared', 'shared', 'shared']);
    expect(flight.isInFlight('k')).toBe(false);
  });

  test('different keys run independently', async () => {
    const flight = new SingleFlight<string>();
    const operation = jest.fn(async () => 'value');

    await Promise.all([flight.run('a', operation), flight.run('b', operation)]);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  test('a failure reaches every waiter and the next call starts fresh', async () => {
    const flight = new SingleFlight<string>();
    const failing = jest.fn(async () => {
      throw new Error('boom');
    });

    const results = await Promise.allSettled([flight.run('k', failing), flight.run('k', failing)]);
    expect(results.map(r => r.status)).toEqual(['rejected', 'rejected']);
    expect(failing).toHaveBeenCalledTimes(1);

    await expect(flight.run('k', async () => 'recovered')).resolves.toBe('recovered');
  });

  test('aborting one waiter leaves the shared operation running for the others', async () => {
    const flight = new SingleFlight<string>();
    const gate = deferred<string>();
    const controller = new AbortController();

    const abandoned = flight.run('k', () => gate.promise, controller.signal);
    const patient = flight.run('k', () => gate.promise);

    controller.abort();
    const error = await abandoned.catch((e: unknown) => e);
    expect(error).toHaveProperty('name', 'AbortError');
    expect(flight.isInFlight('k')).toBe(true);

    gate.resolve('done');
    await expect(patient).resolves.toBe('done');
  });

  test('an already aborted signal rejects without waiting', async () => {
    const flight = new SingleFlight<string>();
    const gate = deferred<string>();
    const controller = new AbortController();
    controller.abort();

    const error = await flight.run('k', () => gate.promise, controller.signal).catch((e: unknown) => e);
    expect(error).toHaveProperty('name', 'AbortError');

    gate.reject(new Error('late failure'));
    // The shared rejection is observed, so nothing leaks as unhandled
    await new Promise(resolve => setImmediate(resolve));
    expect(flight.isInFlight('k')).toBe(false);
  });
});
