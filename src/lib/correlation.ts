import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export type CorrelationSource = 'command' | 'component' | 'direct_message' | 'job' | 'boot';

export type CorrelationContext = {
  correlationId: string;
  source: CorrelationSource;
};

const storage = new AsyncLocalStorage<CorrelationContext>();

export function createCorrelationId(): string {
  return randomUUID();
}

export function runWithCorrelation<T>(context: CorrelationContext, fn: () => T): T {
  return storage.run(context, fn);
}

export function correlationLogFields(): { correlation_id: string | null; source: CorrelationSource | null } {
  const store = storage.getStore();
  return {
    correlation_id: store?.correlationId ?? null,
    source: store?.source ?? null
  };
}
