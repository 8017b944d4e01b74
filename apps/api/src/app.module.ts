import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScanConfigModule } from './config/scan-config.module';
import { ScannerModule } from './scanner/scanner.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['../../.env', '.env'],
    }),
    ScanConfigModule,
    ScannerModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
