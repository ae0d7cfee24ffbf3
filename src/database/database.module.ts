import { Global, Module } from '@nestjs/common';
import { ScanConfigStore } from '../modules/scan-config/scan-config.store';
import { DatabaseService } from './database.service';

@Global()
@Module({
  providers: [
    {
      provide: DatabaseService,
      useFactory: (configStore: ScanConfigStore) => DatabaseService.open(configStore.get().db_path),
      inject: [ScanConfigStore]
    }
  ],
  exports: [DatabaseService]
})
export class DatabaseModule {}
