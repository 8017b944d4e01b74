import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { RunScanDto } from './dto/run-scan.dto';
import { ScannerService } from './scanner.service';
import { ScanResult } from './scanner.types';

@Controller('scanner')
export class ScannerController {
  constructor(private readonly scannerService: ScannerService) {}

  @Post('run')
  @HttpCode(HttpStatus.OK)
  async run(@Body() dto: RunScanDto): Promise<ScanResult> {
    return this.scannerService.run(dto);
  }

  @Get('sources')
  getSources() {
    return this.scannerService.listSources();
  }
}
