import { SourceUnavailableError, describeError } from '../common/errors';
import { Result, err, ok } from '../common/result';
import { SignalSource, SourceContext } from './signal-source';

export interface CollectedSource {
  source: SignalSource;
  result: Result<unknown[], SourceUnavailableError>;
  elapsedMs: number;
}

export interface CollectOptions {
  concurrency: number;
  timeoutMs: number;
}

/** Aborts the call's signal and rejects once `timeoutMs` passes. */
function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = onTimeout();
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });
  const pending = (async () => run(controller.signal))();
  return Promise.race([pending, timeout]).finally(() => clearTimeout(timer));
}

/** One collaborator call. Never rejects: failures and timeouts come back as `err`. */
export async function collectSource(
  source: SignalSource,
  context: SourceContext,
  timeoutMs: number,
): Promise<CollectedSource> {
  const startedAt = Date.now();

  try {
    const records = await withTimeout(
      (signal) => source.fetch(context, signal),
      timeoutMs,
      () => new SourceUnavailableError(source.key, 'timeout', `no response after ${timeoutMs}ms`),
    );
    if (!Array.isArray(records)) {
      return {
        source,
        result: err(new SourceUnavailableError(source.key, 'malformed-payload', 'expected an array of records')),
        elapsedMs: Date.now() - startedAt,
      };
    }
    return { source, result: ok(records), elapsedMs: Date.now() - startedAt };
  } catch (error) {
    const failure =
      error instanceof SourceUnavailableError
        ? error
        : new SourceUnavailableError(source.key, 'unavailable', describeError(error));
    return { source, result: err(failure), elapsedMs: Date.now() - startedAt };
  }
}

/**
 * Runs sources with at most `concurrency` in flight; a slot frees up as soon
 * as its source settles or times out. Output order follows input order.
 */
export async function collectSources(
  sources: readonly SignalSource[],
  context: SourceContext,
  { concurrency, timeoutMs }: CollectOptions,
): Promise<CollectedSource[]> {
  const collected = new Array<CollectedSource>(sources.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < sources.length) {
      const index = next++;
      collected[index] = await collectSource(sources[index], context, timeoutMs);
    }
  };

  const workers = Math.min(Math.max(1, concurrency), sources.length);
  await Promise.all(Array.from({ length: workers }, worker));
  return collected;
}
