import { Module } from '@nestjs/common';
import { SCAN_CONFIG, ScanConfig } from '../config/scan-config';
import { COLLECTED_SOURCE_KEYS } from './source-keys';
import { DEFAULT_SOURCE_PHASES, SIGNAL_SOURCES, SignalSource } from './signal-source';
import { SnapshotSource } from './snapshot-source';
import { SourcesService } from './sources.service';

@Module({
  providers: [
    {
      provide: SIGNAL_SOURCES,
      useFactory: (config: ScanConfig): SignalSource[] =>
        COLLECTED_SOURCE_KEYS.map((key) => new SnapshotSource(key, DEFAULT_SOURCE_PHASES[key], config.snapshotDir)),
      inject: [SCAN_CONFIG],
    },
    SourcesService,
  ],
  exports: [SourcesService],
})
export class SourcesModule {}
