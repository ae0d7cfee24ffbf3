import { Module } from '@nestjs/common';
import { DetectionsModule } from '../detections/detections.module';
import { ExportController } from './export.controller';

@Module({
  imports: [DetectionsModule],
  controllers: [ExportController]
})
export class ExportModule {}
