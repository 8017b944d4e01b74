import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SCAN_CONFIG, loadScanConfig } from './scan-config';

@Global()
@Module({
  providers: [
    {
      provide: SCAN_CONFIG,
      useFactory: (configService: ConfigService) => loadScanConfig(configService),
      inject: [ConfigService],
    },
  ],
  exports: [SCAN_CONFIG],
})
export class ScanConfigModule {}
