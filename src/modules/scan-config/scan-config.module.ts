import { Global, Module } from '@nestjs/common';
import { resolveConfigPath } from '../../config/env';
import { ScanConfigController } from './scan-config.controller';
import { ScanConfigStore } from './scan-config.store';

@Global()
@Module({
  controllers: [ScanConfigController],
  providers: [
    {
      provide: ScanConfigStore,
      useFactory: () => ScanConfigStore.open(resolveConfigPath())
    }
  ],
  exports: [ScanConfigStore]
})
export class ScanConfigModule {}
