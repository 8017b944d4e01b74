import { Inject, Injectable, Logger } from '@nestjs/common';
import { SCAN_CONFIG, ScanConfig } from '../config/scan-config';
import { CollectedSourceKey, isCollectedSourceKey } from './source-keys';
import { collectSources } from './source-collector';
import { normalizeRecords } from './source-normalizer';
import { CollectedSignals } from './source-signal';
import { SIGNAL_SOURCES, SignalSource, SourceContext, SourcePhase } from './signal-source';

export type SourceStatus = 'ok' | 'unavailable' | 'skipped';

export interface SourceReport {
  key: string;
  phase: SourcePhase | null;
  status: SourceStatus;
  records: number;
  malformed: number;
  invalidTickers: number;
  elapsedMs: number;
  error?: string;
}

export interface GatheredSources {
  signals: CollectedSignals;
  reports: SourceReport[];
}

export interface ResolvedSources {
  active: SignalSource[];
  skipped: SourceReport[];
}

interface StoredCounts {
  records: number;
  malformed: number;
  invalidTickers: number;
}

function storeNormalized<K extends CollectedSourceKey>(
  target: CollectedSignals<K>,
  key: K,
  rawRecords: readonly unknown[],
): StoredCounts {
  const normalized = normalizeRecords(key, rawRecords);
  target[key] = normalized.signals;
  return {
    records: normalized.signals.size,
    malformed: normalized.malformed.length,
    invalidTickers: normalized.invalidTickers.length,
  };
}

@Injectable()
export class SourcesService {
  private readonly logger = new Logger(SourcesService.name);

  constructor(
    @Inject(SIGNAL_SOURCES)
    private readonly sources: SignalSource[],
    @Inject(SCAN_CONFIG)
    private readonly config: ScanConfig,
  ) {}

  list(): Array<{ key: CollectedSourceKey; phase: SourcePhase }> {
    return this.sources.map(({ key, phase }) => ({ key, phase }));
  }

  /**
   * Picks the registered sources named in `enabled` (all of them when omitted).
   * Names that match nothing are reported as skipped instead of failing the scan.
   */
  resolve(enabled?: readonly string[]): ResolvedSources {
    if (!enabled) {
      return { active: [...this.sources], skipped: [] };
    }

    const wanted = new Set(enabled);
    const active = this.sources.filter((source) => wanted.has(source.key));
    const registered = new Set<string>(this.sources.map((source) => source.key));
    const skipped: SourceReport[] = [...wanted]
      .filter((key) => key !== 'momentum' && !registered.has(key))
      .map((key) => ({
        key,
        phase: null,
        status: 'skipped',
        records: 0,
        malformed: 0,
        invalidTickers: 0,
        elapsedMs: 0,
        error: isCollectedSourceKey(key) ? 'no collaborator registered' : 'unknown source',
      }));

    return { active, skipped };
  }

  async gather(sources: readonly SignalSource[], context: SourceContext): Promise<GatheredSources> {
    const collected = await collectSources(sources, context, {
      concurrency: this.config.sourceConcurrency,
      timeoutMs: this.config.sourceTimeoutMs,
    });

    const signals: CollectedSignals = {};
    const reports: SourceReport[] = [];

    for (const { source, result, elapsedMs } of collected) {
      if (!result.ok) {
        this.logger.warn(result.error.message);
        reports.push({
          key: source.key,
          phase: source.phase,
          status: 'unavailable',
          records: 0,
          malformed: 0,
          invalidTickers: 0,
          elapsedMs,
          error: result.error.message,
        });
        continue;
      }

      const counts = storeNormalized(signals, source.key, result.value);
      if (counts.malformed > 0) {
        this.logger.debug(`${source.key}: skipped ${counts.malformed} malformed record(s)`);
      }
      if (counts.invalidTickers > 0) {
        this.logger.debug(`${source.key}: dropped ${counts.invalidTickers} invalid ticker(s)`);
      }
      this.logger.log(`${source.key}: ${counts.records} tickers in ${elapsedMs}ms`);
      reports.push({ key: source.key, phase: source.phase, status: 'ok', ...counts, elapsedMs });
    }

    return { signals, reports };
  }
}
