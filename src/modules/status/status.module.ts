import { Module } from '@nestjs/common';
import { DetectionsModule } from '../detections/detections.module';
import { ScannerModule } from '../scanner/scanner.module';
import { StatusController } from './status.controller';
import { StatusService } from './status.service';

@Module({
  imports: [DetectionsModule, ScannerModule],
  controllers: [StatusController],
  providers: [StatusService]
})
export class StatusModule {}
