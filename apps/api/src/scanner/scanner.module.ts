import { Module } from '@nestjs/common';
import { MomentumModule } from '../momentum/momentum.module';
import { ScoringModule } from '../scoring/scoring.module';
import { SourcesModule } from '../sources/sources.module';
import { ThemesModule } from '../themes/themes.module';
import { UniverseModule } from '../universe/universe.module';
import { ScannerController } from './scanner.controller';
import { ScannerService } from './scanner.service';

@Module({
  imports: [SourcesModule, ThemesModule, UniverseModule, MomentumModule, ScoringModule],
  controllers: [ScannerController],
  providers: [ScannerService],
  exports: [ScannerService],
})
export class ScannerModule {}
