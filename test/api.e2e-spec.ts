import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { writeFileSync } from 'fs';
import { join } from 'path';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { DetectionStore } from '../src/modules/detections/detection.store';
import { DEFAULT_SCAN_CONFIG } from '../src/modules/scan-config/scan-config.schema';
import { ADAPTER_GATEWAY } from '../src/modules/scanner/adapter/adapter-gateway';
import { createTempDir, observation, ScriptedGateway } from './helpers';

const T = Date.UTC(2024, 0, 2, 3, 4, 5);
const UUID_V4_LIKE = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

describe('HTTP API e2e', () => {
  let app: INestApplication;
  let temp: ReturnType<typeof createTempDir>;
  let dbPath: string;

  beforeAll(async () => {
    temp = createTempDir('btwatch-e2e-');
    dbPath = join(temp.dir, 'detections.sqlite');
    const configPath = join(temp.dir, 'config.json');
    writeFileSync(configPath, JSON.stringify({ ...DEFAULT_SCAN_CONFIG, db_path: dbPath }));
    process.env.BTWATCH_CONFIG = configPath;
    process.env.SCANNER_ENABLED = 'false';

    const moduleRef = await Test.createTestingModule({
      imports: [AppModule]
    })
      .overrideProvider(ADAPTER_GATEWAY)
      .useValue(new ScriptedGateway())
      .compile();

    app = moduleRef.createNestApplication();
    await app.init();

    await moduleRef.get(DetectionStore).appendBatch([
      observation('aa:00:00:00:00:01', T, { name: 'Desk, left', rssi: -41 }),
      observation('BB:00:00:00:00:02', T + 1000, { rssi: -70 }),
      observation('AA:00:00:00:00:01', T + 2000, { name: 'Desk, left', rssi: -45 })
    ]);
  });

  afterAll(async () => {
    await app.close();
    delete process.env.BTWATCH_CONFIG;
    delete process.env.SCANNER_ENABLED;
    temp.cleanup();
  });

  it('GET /api/health answers ok', async () => {
    const response = await request(app.getHttpServer()).get('/api/health').expect(200);

    expect(response.body).toEqual({ status: 'ok' });
  });

  it('GET /api/summary counts detections per device', async () => {
    const response = await request(app.getHttpServer()).get('/api/summary?top=1').expect(200);

    expect(response.body).toEqual({
      total_records: 3,
      unique_devices: 2,
      top_devices: [{ address: 'AA:00:00:00:00:01', count: 2 }],
      first_seen: '2024-01-02T03:04:05.000Z',
      last_seen: '2024-01-02T03:04:07.000Z'
    });
  });

  it('GET /api/recent lists newest first', async () => {
    const response = await request(app.getHttpServer()).get('/api/recent?limit=2').expect(200);

    expect(response.body).toEqual([
      { address: 'AA:00:00:00:00:01', name: 'Desk, left', rssi: -45, timestamp: '2024-01-02T03:04:07.000Z' },
      { address: 'BB:00:00:00:00:02', name: null, rssi: -70, timestamp: '2024-01-02T03:04:06.000Z' }
    ]);
  });

  it('GET /api/recent rejects an out-of-range limit', async () => {
    const response = await request(app.getHttpServer()).get('/api/recent?limit=0').expect(400);

    expect(response.body).toMatchObject({
      statusCode: 400,
      kind: 'bad_request',
      message: 'limit must be 1..1000',
      path: '/api/recent?limit=0'
    });
  });

  it('GET /api/timeline merges detections using the configured gap', async () => {
    const response = await request(app.getHttpServer()).get('/api/timeline').expect(200);

    expect(response.body).toEqual({
      hours: 0,
      gap_seconds: 6,
      devices: [
        {
          address: 'AA:00:00:00:00:01',
          name: 'Desk, left',
          detections: 2,
          sessions: [
            {
              first_seen: '2024-01-02T03:04:05.000Z',
              last_seen: '2024-01-02T03:04:07.000Z',
              detections: 2
            }
          ]
        },
        {
          address: 'BB:00:00:00:00:02',
          name: null,
          detections: 1,
          sessions: [
            {
              first_seen: '2024-01-02T03:04:06.000Z',
              last_seen: '2024-01-02T03:04:06.000Z',
              detections: 1
            }
          ]
        }
      ]
    });
  });

  it('GET /api/config returns the live configuration', async () => {
    const response = await request(app.getHttpServer()).get('/api/config').expect(200);

    expect(response.body).toEqual({ ...DEFAULT_SCAN_CONFIG, db_path: dbPath });
  });

  it('POST /api/config rejects a non-positive duration and names the field', async () => {
    const response = await request(app.getHttpServer())
      .post('/api/config')
      .send({ scan_duration: -1 })
      .expect(400);

    expect(response.body).toMatchObject({ statusCode: 400, kind: 'validation', fields: ['scan_duration'] });

    const current = await request(app.getHttpServer()).get('/api/config').expect(200);
    expect(current.body.scan_duration).toBe(5);
  });

  it('POST /api/config rejects unknown fields', async () => {
    const response = await request(app.getHttpServer())
      .post('/api/config')
      .send({ scan_interval: 4, volume: 11 })
      .expect(400);

    expect(response.body).toMatchObject({ kind: 'validation', fields: ['volume'] });
  });

  it('POST /api/config rejects a body that is not a JSON object', async () => {
    const response = await request(app.getHttpServer()).post('/api/config').send([1, 2]).expect(400);

    expect(response.body).toMatchObject({
      statusCode: 400,
      kind: 'validation',
      fields: ['body'],
      message: 'Invalid field(s): body (request body must be a JSON object)'
    });
  });

  it('POST /api/config applies a valid patch', async () => {
    const response = await request(app.getHttpServer())
      .post('/api/config')
      .send({ scan_interval: 4, port: 9000 })
      .expect(201);

    expect(response.body).toEqual({
      config: { ...DEFAULT_SCAN_CONFIG, db_path: dbPath, scan_interval: 4, port: 9000 },
      requires_restart: ['port']
    });

    const timeline = await request(app.getHttpServer()).get('/api/timeline').expect(200);
    expect(timeline.body.gap_seconds).toBe(8);
  });

  it('GET /api/export-csv streams every record oldest first', async () => {
    const response = await request(app.getHttpServer()).get('/api/export-csv').expect(200);

    expect(response.headers['content-type']).toBe('text/csv; charset=utf-8');
    expect(response.headers['content-disposition']).toMatch(
      /^attachment; filename=btwatch_export_all_\d{8}_\d{6}\.csv$/
    );
    expect(response.text).toBe(
      'address,name,rssi,timestamp\r\n' +
        'AA:00:00:00:00:01,"Desk, left",-41,2024-01-02T03:04:05.000Z\r\n' +
        'BB:00:00:00:00:02,,-70,2024-01-02T03:04:06.000Z\r\n' +
        'AA:00:00:00:00:01,"Desk, left",-45,2024-01-02T03:04:07.000Z\r\n'
    );
  });

  it('GET /api/export-csv honours a half-open range', async () => {
    const response = await request(app.getHttpServer())
      .get('/api/export-csv')
      .query({ since: '2024-01-02T03:04:06.000Z', until: '2024-01-02T03:04:07.000Z' })
      .expect(200);

    expect(response.headers['content-disposition']).toMatch(/filename=btwatch_export_range_/);
    expect(response.text).toBe(
      'address,name,rssi,timestamp\r\n' + 'BB:00:00:00:00:02,,-70,2024-01-02T03:04:06.000Z\r\n'
    );
  });

  it('GET /api/export-csv refuses hours combined with a range', async () => {
    const response = await request(app.getHttpServer())
      .get('/api/export-csv')
      .query({ hours: '2', since: '2024-01-02T03:04:06.000Z' })
      .expect(400);

    expect(response.body).toMatchObject({
      kind: 'bad_request',
      message: 'Use either hours or since/until, not both'
    });
  });

  it('GET /api/export-csv rejects range bounds that are not ISO timestamps', async () => {
    const response = await request(app.getHttpServer())
      .get('/api/export-csv')
      .query({ since: '1', until: '2' })
      .expect(400);

    expect(response.body).toMatchObject({ kind: 'bad_request', message: 'Invalid since timestamp' });
  });

  it('GET /api/export-stats describes the exported range', async () => {
    const response = await request(app.getHttpServer()).get('/api/export-stats').expect(200);

    expect(response.body).toEqual({
      total_records: 3,
      start_time: '2024-01-02T03:04:05.000Z',
      end_time: '2024-01-02T03:04:07.000Z',
      duration: 'All time'
    });
  });

  it('GET /api/status reports storage and scanner state', async () => {
    const response = await request(app.getHttpServer()).get('/api/status').expect(200);

    expect(response.body).toMatchObject({
      db: { ok: true },
      workers: {
        scanner: { ok: true, state: 'stopped', running: false, cycles: 0, consecutiveFailures: 0 }
      },
      detections: { totalRecords: 3, latestScanAt: '2024-01-02T03:04:07.000Z' }
    });
    expect(typeof response.body.version).toBe('string');
  });

  it('echoes a provided X-Request-Id and generates one when missing', async () => {
    const echoed = await request(app.getHttpServer())
      .get('/api/recent?limit=abc')
      .set('X-Request-Id', 'req-test-1')
      .expect(400);

    expect(echoed.headers['x-request-id']).toBe('req-test-1');
    expect(echoed.body.requestId).toBe('req-test-1');

    const generated = await request(app.getHttpServer()).get('/api/health').expect(200);
    expect(generated.headers['x-request-id']).toMatch(UUID_V4_LIKE);
  });

  it('answers unknown routes with a not_found error body', async () => {
    const response = await request(app.getHttpServer()).get('/api/nope').expect(404);

    expect(response.body).toMatchObject({ statusCode: 404, kind: 'not_found', path: '/api/nope' });
  });

  it('POST /api/clear-data removes every record', async () => {
    const response = await request(app.getHttpServer()).post('/api/clear-data').expect(200);

    expect(response.body).toEqual({ records_before: 3, records_deleted: 3, success: true });

    const summary = await request(app.getHttpServer()).get('/api/summary').expect(200);
    expect(summary.body.total_records).toBe(0);
  });
});
