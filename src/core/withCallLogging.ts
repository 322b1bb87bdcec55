/**
 * Method Call Logging
 * Layer: Core
 *
 * Wraps an object so that every method call logs its arguments, how long it
 * took, and whether it failed, without each method doing it by hand. Applied
 * once, when the object is built:
 *
 *   const connector = withCallLogging(new PostgresConnector(pool, log), log);
 *
 * Methods run against the unwrapped object, so calls a method makes on
 * `this` are not logged a second time. Errors are logged and rethrown as-is.
 */
import { performance } from 'node:perf_hooks';

import type { Logger } from './logger';

export function withCallLogging<T extends object>(
  target: T,
  log: Logger,
  label: string = target.constructor.name,
): T {
  return new Proxy(target, {
    get(obj, prop, receiver) {
      const value: unknown = Reflect.get(obj, prop, receiver);
      if (typeof value !== 'function' || typeof prop !== 'string' || prop === 'constructor') {
        return value;
      }

      return (...args: unknown[]): unknown => {
        const method = `${label}.${prop}`;
        const startedAt = performance.now();
        const elapsedMs = () => Math.round((performance.now() - startedAt) * 1000) / 1000;

        log.debug({ method, args }, `${method} called`);

        const succeeded = <R>(result: R): R => {
          log.debug({ method, durationMs: elapsedMs() }, `${method} returned`);
          return result;
        };
        const failed = (err: unknown): never => {
          log.error({ method, err, durationMs: elapsedMs() }, `${method} raised an exception`);
          throw err;
        };

        try {
          const result: unknown = value.apply(obj, args);
          return result instanceof Promise ? result.then(succeeded, failed) : succeeded(result);
        } catch (err) {
          return failed(err);
        }
      };
    },
  });
}
