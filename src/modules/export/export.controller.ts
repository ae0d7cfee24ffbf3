import { BadRequestException, Controller, Get, Query, Res } from '@nestjs/common';
import type { Response } from 'express';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { describeError } from '../../common/errors';
import {
  parseDateParam,
  parseIntegerParam,
  QueryValue
} from '../../common/http/query-params';
import { logInfo, logWarn } from '../../common/logging/structured-logger';
import { DetectionStore, ExportRange, ExportStats } from '../detections/detection.store';
import { csvLines, exportFilename } from './csv';

const MAX_HOURS = 24 * 365;

type ExportQuery = {
  hours?: QueryValue;
  since?: QueryValue;
  until?: QueryValue;
};

@Controller('api')
export class ExportController {
  constructor(private readonly detections: DetectionStore) {}

  /**
   * Streams the log as CSV. Errors before the first byte get a normal JSON
   * error reply; a failure mid-stream aborts the connection and the client
   * keeps whatever rows already arrived.
   */
  @Get('export-csv')
  async exportCsv(@Query() query: ExportQuery, @Res() res: Response): Promise<void> {
    const range = parseExportRange(query);
    const rows = this.detections.export(range);
    const first = await rows.next();

    const filename = exportFilename(
      { hours: range.hours, ranged: range.since !== undefined || range.until !== undefined },
      new Date()
    );
    res.status(200);
    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.setHeader('Content-Disposition', `attachment; filename=${filename}`);

    let rowCount = 0;
    const lines = csvLines(first.done ? [] : [first.value], rows, () => {
      rowCount += 1;
    });

    try {
      await pipeline(Readable.from(lines), res);
      logInfo('export.completed', { filename, rows: rowCount });
    } catch (error) {
      logWarn('export.interrupted', {
        filename,
        rowsSent: rowCount,
        message: describeError(error)
      });
    } finally {
      await rows.return();
    }
  }

  @Get('export-stats')
  exportStats(@Query('hours') hoursRaw?: QueryValue): ExportStats {
    const hours = parseIntegerParam(hoursRaw, 'hours', { min: 0, max: MAX_HOURS });
    return this.detections.exportStats(hours);
  }
}

function parseExportRange(query: ExportQuery): ExportRange {
  const hours = parseIntegerParam(query.hours, 'hours', { min: 0, max: MAX_HOURS });
  const since = parseDateParam(query.since, 'since');
  const until = parseDateParam(query.until, 'until');

  if (since === undefined && until === undefined) {
    return { hours };
  }
  if (hours !== undefined) {
    throw new BadRequestException('Use either hours or since/until, not both');
  }
  if (since && until && since.getTime() >= until.getTime()) {
    throw new BadRequestException('since must be earlier than until');
  }
  return { since, until };
}
