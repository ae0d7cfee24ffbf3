import { Body, Controller, Get, Post } from '@nestjs/common';
import { UpdateScanConfigDto } from './dto/update-scan-config.dto';
import { ScanConfig } from './scan-config.schema';
import { ScanConfigStore, ScanConfigUpdateResult } from './scan-config.store';

@Controller('api/config')
export class ScanConfigController {
  constructor(private readonly configStore: ScanConfigStore) {}

  @Get()
  get(): Readonly<ScanConfig> {
    return this.configStore.get();
  }

  @Post()
  async update(@Body() dto: UpdateScanConfigDto): Promise<ScanConfigUpdateResult> {
    return this.configStore.update({ ...dto });
  }
}
