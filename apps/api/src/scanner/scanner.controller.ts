import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { ScannerService, ScanReport } from './scanner.service';
import { ScanDto } from './dto/scan.dto';

@Controller('scanner')
export class ScannerController {
  constructor(private readonly scannerService: ScannerService) {}

  @Post('scan')
  @HttpCode(200)
  async scan(@Body() dto: ScanDto): Promise<ScanReport> {
    return this.scannerService.scan(dto.tickers, {
      period: dto.period,
      strategy: dto.strategy,
      applyFundamentals: dto.fundamentals,
    });
  }
}
