import { Controller, Get, HttpCode, Post, Query } from '@nestjs/common';
import { parseIntegerParam, QueryValue } from '../../common/http/query-params';
import { sessionGapSeconds } from '../scan-config/scan-config.schema';
import { ScanConfigStore } from '../scan-config/scan-config.store';
import {
  ClearResult,
  DEFAULT_TOP_DEVICES,
  DetectionStore,
  DetectionSummary,
  Timeline
} from './detection.store';
import { ObservationView, toObservationView } from './observation';

const DEFAULT_RECENT_LIMIT = 50;
const MAX_RECENT_LIMIT = 1000;
const MAX_TOP_DEVICES = 100;
const MAX_HOURS = 24 * 365;

@Controller('api')
export class DetectionsController {
  constructor(
    private readonly detections: DetectionStore,
    private readonly configStore: ScanConfigStore
  ) {}

  @Get('summary')
  summary(@Query('top') topRaw?: QueryValue): DetectionSummary {
    const top = parseIntegerParam(topRaw, 'top', { min: 1, max: MAX_TOP_DEVICES }, DEFAULT_TOP_DEVICES);
    return this.detections.querySummary(top);
  }

  @Get('recent')
  recent(@Query('limit') limitRaw?: QueryValue): ObservationView[] {
    const limit = parseIntegerParam(
      limitRaw,
      'limit',
      { min: 1, max: MAX_RECENT_LIMIT },
      DEFAULT_RECENT_LIMIT
    );
    return this.detections.queryRecent(limit).map(toObservationView);
  }

  @Get('timeline')
  timeline(@Query('hours') hoursRaw?: QueryValue): Timeline {
    const hours = parseIntegerParam(hoursRaw, 'hours', { min: 0, max: MAX_HOURS }, 0);
    return this.detections.queryTimeline({
      hours,
      gapSeconds: sessionGapSeconds(this.configStore.get())
    });
  }

  @Post('clear-data')
  @HttpCode(200)
  async clear(): Promise<ClearResult> {
    return this.detections.clearAll();
  }
}
