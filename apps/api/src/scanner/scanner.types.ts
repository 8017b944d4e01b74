import { MomentumProfile } from '../momentum/momentum.types';
import { CombinedRanking, ShortCandidate } from '../scoring/scoring.types';
import { LongWeights } from '../sources/source-keys';
import { SourceReport } from '../sources/sources.service';
import { ThemeReport } from '../themes/themes.types';

export interface ScanOptions {
  /** Source keys to run; every registered source when omitted. */
  sources?: readonly string[];
  weights?: Partial<LongWeights>;
  /** Added to whatever the theme scan finds hot. */
  themeTickers?: readonly string[];
  /** Overrides the configured theme discovery switch. */
  discoverThemes?: boolean;
  squeezePenalty?: boolean;
  minShortScore?: number;
  top?: number;
  minScore?: number;
  minSources?: number;
  asOf?: Date;
}

export interface ScanResult {
  startedAt: string;
  completedAt: string;
  universeSize: number;
  sources: SourceReport[];
  rankings: CombinedRanking[];
  shortCandidates: ShortCandidate[];
  momentum: MomentumProfile[];
  themes: ThemeReport[];
}
