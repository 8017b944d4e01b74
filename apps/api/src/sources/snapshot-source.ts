import { readFile } from 'fs/promises';
import { join } from 'path';
import { SourceUnavailableError, describeError } from '../common/errors';
import { normalizeTicker } from '../universe/ticker-filter';
import { CollectedSourceKey } from './source-keys';
import { SignalSource, SourceContext, SourcePhase } from './signal-source';

/**
 * Reads `<directory>/<key>.json`, an array of records exported by an external
 * connector for this run.
 */
export class SnapshotSource implements SignalSource {
  constructor(
    readonly key: CollectedSourceKey,
    readonly phase: SourcePhase,
    private readonly directory: string,
  ) {}

  get filePath(): string {
    return join(this.directory, `${this.key}.json`);
  }

  async fetch(context: SourceContext, signal?: AbortSignal): Promise<unknown[]> {
    let text: string;
    try {
      text = await readFile(this.filePath, { encoding: 'utf8', signal });
    } catch (error) {
      throw new SourceUnavailableError(this.key, 'unavailable', describeError(error));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new SourceUnavailableError(this.key, 'malformed-payload', describeError(error));
    }

    if (!Array.isArray(parsed)) {
      throw new SourceUnavailableError(this.key, 'malformed-payload', `${this.filePath} is not a JSON array`);
    }

    if (this.phase === 'discovery') {
      return parsed;
    }

    const universe = new Set(context.universe);
    return parsed.filter(
      (record: unknown) =>
        typeof record === 'object' &&
        record !== null &&
        'ticker' in record &&
        typeof record.ticker === 'string' &&
        universe.has(normalizeTicker(record.ticker)),
    );
  }
}
