import { Module } from '@nestjs/common';
import { DetectionStore } from './detection.store';
import { DetectionsController } from './detections.controller';

@Module({
  controllers: [DetectionsController],
  providers: [DetectionStore],
  exports: [DetectionStore]
})
export class DetectionsModule {}
