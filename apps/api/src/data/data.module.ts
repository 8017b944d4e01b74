import { Module } from '@nestjs/common';
import { PolygonService } from './polygon.service';
import { MARKET_DATA_PROVIDER } from './data.types';

@Module({
  providers: [
    PolygonService,
    { provide: MARKET_DATA_PROVIDER, useExisting: PolygonService },
  ],
  exports: [MARKET_DATA_PROVIDER],
})
export class DataModule {}
