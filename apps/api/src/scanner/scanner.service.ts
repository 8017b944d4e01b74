import { Inject, Injectable, Logger } from '@nestjs/common';
import { SCAN_CONFIG, ScanConfig } from '../config/scan-config';
import { scanBearishMomentum } from '../momentum/bearish-trend';
import { MomentumService } from '../momentum/momentum.service';
import { MomentumProfile } from '../momentum/momentum.types';
import { filterByScore, filterBySources, formatScoreIndicator } from '../scoring/score-format';
import { ScoringService } from '../scoring/scoring.service';
import { CombinedRanking } from '../scoring/scoring.types';
import { COLLECTED_SOURCE_KEYS } from '../sources/source-keys';
import { identifyHotHoldings, momentumSignals } from '../sources/source-normalizer';
import { SourcePhase } from '../sources/signal-source';
import { CollectedSignals, HotHolding, LongSignals } from '../sources/source-signal';
import { SourceReport, SourcesService } from '../sources/sources.service';
import { hotThemeTickers } from '../themes/theme-scanner';
import { ThemesService } from '../themes/themes.service';
import { ThemeReport } from '../themes/themes.types';
import { normalizeTicker } from '../universe/ticker-filter';
import { UniverseService } from '../universe/universe.service';
import { ScanOptions, ScanResult } from './scanner.types';

const LOGGED_RANKINGS = 10;

function discoveredTickers(signals: CollectedSignals, hotHoldings: ReadonlyMap<string, HotHolding>): string[] {
  const tickers: string[] = [...hotHoldings.keys()];
  for (const key of COLLECTED_SOURCE_KEYS) {
    // etf_flows reports the ETFs themselves; their holdings come in through hotHoldings
    if (key === 'etf_flows') continue;
    tickers.push(...(signals[key]?.keys() ?? []));
  }
  return tickers;
}

@Injectable()
export class ScannerService {
  private readonly logger = new Logger(ScannerService.name);

  constructor(
    private readonly sourcesService: SourcesService,
    private readonly themesService: ThemesService,
    private readonly universeService: UniverseService,
    private readonly momentumService: MomentumService,
    private readonly scoringService: ScoringService,
    @Inject(SCAN_CONFIG)
    private readonly config: ScanConfig,
  ) {}

  listSources(): Array<{ key: string; phase: SourcePhase }> {
    return [{ key: 'momentum', phase: 'enrichment' }, ...this.sourcesService.list()];
  }

  /**
   * One batch pass: discover sources and hot themes, build the universe,
   * collect enrichment sources and momentum for it, then score both sides.
   * Every intermediate value is local to the call, so concurrent runs do not
   * interfere.
   */
  async run(options: ScanOptions = {}): Promise<ScanResult> {
    const startedAt = new Date();
    const asOf = options.asOf ?? startedAt;
    const momentumEnabled = !options.sources || options.sources.includes('momentum');
    const themesEnabled = options.discoverThemes ?? this.config.themeDiscovery;
    const { active, skipped } = this.sourcesService.resolve(options.sources);

    this.logger.log(
      `Starting scan with ${active.length} source(s)${momentumEnabled ? ' plus momentum' : ''}`,
    );

    // Discover
    const [discovery, themes] = await Promise.all([
      this.sourcesService.gather(
        active.filter((source) => source.phase === 'discovery'),
        { universe: [], asOf },
      ),
      themesEnabled ? this.themesService.discover(asOf) : Promise.resolve<ThemeReport[]>([]),
    ]);
    const hotHoldings = identifyHotHoldings(discovery.signals.etf_flows);
    const themeTickers = [
      ...new Set([...(options.themeTickers ?? []), ...hotThemeTickers(themes)].map(normalizeTicker)),
    ];

    // Universe
    const universe = this.universeService.build({
      discovered: discoveredTickers(discovery.signals, hotHoldings),
      themeTickers,
    });

    // Collect + enrich
    const momentumStartedAt = Date.now();
    const [enrichment, momentum] = await Promise.all([
      this.sourcesService.gather(
        active.filter((source) => source.phase === 'enrichment'),
        { universe, asOf },
      ),
      momentumEnabled ? this.momentumService.scan(universe, asOf) : Promise.resolve<MomentumProfile[]>([]),
    ]);
    const momentumReport: SourceReport = momentumEnabled
      ? {
          key: 'momentum',
          phase: 'enrichment',
          status: 'ok',
          records: momentum.length,
          malformed: 0,
          invalidTickers: 0,
          elapsedMs: Date.now() - momentumStartedAt,
        }
      : {
          key: 'momentum',
          phase: 'enrichment',
          status: 'skipped',
          records: 0,
          malformed: 0,
          invalidTickers: 0,
          elapsedMs: 0,
        };

    // Score
    const collected: CollectedSignals = { ...discovery.signals, ...enrichment.signals };
    const longSignals: LongSignals = {
      ...collected,
      momentum: momentumEnabled ? momentumSignals(momentum) : undefined,
    };

    let rankings = this.scoringService.rankLong(
      { signals: longSignals, hotHoldings, themeTickers: new Set(themeTickers) },
      options.weights,
    );
    if (options.minScore !== undefined) rankings = filterByScore(rankings, options.minScore);
    if (options.minSources !== undefined) rankings = filterBySources(rankings, options.minSources);

    let shortCandidates = this.scoringService.rankShort(
      {
        bearishMomentum: scanBearishMomentum(momentum, this.config.minBearishMomentumScore),
        signals: collected,
      },
      { squeezePenalty: options.squeezePenalty, minShortScore: options.minShortScore },
    );

    if (options.top !== undefined) {
      rankings = rankings.slice(0, options.top);
      shortCandidates = shortCandidates.slice(0, options.top);
    }

    this.logTopRankings(rankings);

    const completedAt = new Date();
    this.logger.log(
      `Scan complete in ${completedAt.getTime() - startedAt.getTime()}ms: ` +
        `${rankings.length} ranked, ${shortCandidates.length} short candidates`,
    );

    return {
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      universeSize: universe.length,
      sources: [...discovery.reports, ...enrichment.reports, momentumReport, ...skipped],
      rankings,
      shortCandidates,
      momentum,
      themes,
    };
  }

  private logTopRankings(rankings: readonly CombinedRanking[]): void {
    rankings.slice(0, LOGGED_RANKINGS).forEach((ranking, index) => {
      this.logger.log(
        `${index + 1}. ${ranking.ticker.padEnd(6)} ${ranking.combinedScore.toFixed(1).padStart(5)} ` +
          `${formatScoreIndicator(ranking.combinedScore).padEnd(3)} ${ranking.summary}`,
      );
    });
  }
}
