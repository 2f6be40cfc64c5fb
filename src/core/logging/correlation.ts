import { AsyncLocalStorage } from 'node:async_hooks';

/**
 * Per-request correlation id, carried across awaits.
 * The root logger's mixin reads it, so every line written while a request is
 * in flight carries `correlationId` without passing it around.
 */
const storage = new AsyncLocalStorage<string>();

export function getCorrelationId(): string | undefined {
  return storage.getStore();
}

export function runWithCorrelationId<T>(correlationId: string, fn: () => T): T {
  return storage.run(correlationId, fn);
}

export function correlationMixin(): Record<string, string> {
  const correlationId = storage.getStore();
  return correlationId === undefined ? {} : { correlationId };
}
