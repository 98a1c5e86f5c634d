import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { App } from 'supertest/types';
import * as path from 'path';
import * as fs from 'fs';
import { createE2eApp, createTempDir, removeTempDir } from './utils/test-helpers';

/**
 * E2E Tests for the analysis and alert endpoints
 *
 * Boots the feature modules with DATA_FOLDER pointing at a scratch directory
 * (scheduled processing disabled) and uploads the matrix fixtures through
 * Multer.
 */
describe('AnalysisController (e2e)', () => {
  let app: INestApplication<App>;
  let dataFolder: string;

  const fixturesPath = path.join(__dirname, 'fixtures');
  const latPath = path.join(fixturesPath, 'lat.csv');
  const lonPath = path.join(fixturesPath, 'lon.csv');
  const s4cPath = path.join(fixturesPath, 's4c.csv');

  beforeAll(() => {
    for (const fixture of [latPath, lonPath, s4cPath]) {
      if (!fs.existsSync(fixture)) {
        throw new Error(`Test fixture not found: ${fixture}`);
      }
    }
  });

  beforeEach(async () => {
    dataFolder = await createTempDir();
    app = await createE2eApp({ DATA_FOLDER: dataFolder });
  });

  afterEach(async () => {
    await app.close();
    await removeTempDir(dataFolder);
  });

  const upload = () =>
    request(app.getHttpServer())
      .post('/analyze')
      .attach('lat_file', latPath)
      .attach('lon_file', lonPath)
      .attach('s4c_file', s4cPath);

  describe('POST /analyze', () => {
    it('should analyse the uploaded matrices and return 201', async () => {
      const response = await upload().expect(201);

      expect(response.body.analysis_complete).toBe(true);
      expect(response.body.transformed_data_result.metadata).toMatchObject({
        total_records: 7,
        unique_satellites: 2,
        satellite_list: ['G01', 'G05'],
        time_range: {
          start: '2024-03-01 12:00:00',
          end: '2024-03-01 12:03:00',
        },
      });
      expect(
        response.body.transformed_data_result.processing_info.data_quality,
      ).toEqual({
        complete_records: 7,
        data_coverage: '87.50%',
        alignment_issues: [],
      });
    });

    it('should return 400 when a file is missing', async () => {
      const response = await request(app.getHttpServer())
        .post('/analyze')
        .attach('lat_file', latPath)
        .attach('lon_file', lonPath)
        .expect(400);

      expect(response.body.message).toBe(
        'Upload all three matrices using form fields "lat_file", "lon_file" and "s4c_file".',
      );
    });

    it('should return 400 for a malformed matrix', async () => {
      const response = await request(app.getHttpServer())
        .post('/analyze')
        .attach('lat_file', latPath)
        .attach('lon_file', lonPath)
        .attach('s4c_file', Buffer.from(',G01\nlast tuesday,0.3\n'), 's4c.csv')
        .expect(400);

      expect(response.body.message).toBe(
        '[s4c] Row 2: invalid timestamp "last tuesday"',
      );
    });
  });

  describe('GET endpoints', () => {
    it('should return 404 before any analysis', async () => {
      const response = await request(app.getHttpServer())
        .get('/data/transformed')
        .expect(404);

      expect(response.body.message).toBe(
        'No analysis results found. Please run the analysis first by POSTing to /analyze.',
      );
    });

    it('should serve the records of the last analysis in order', async () => {
      await upload().expect(201);

      const response = await request(app.getHttpServer())
        .get('/data/transformed')
        .expect(200);

      expect(response.body).toEqual([
        { Satellite: 'G01', Time: '2024-03-01 12:00:00', S4C: 0.25, Lat: 13.712345, Lon: 100.5 },
        { Satellite: 'G05', Time: '2024-03-01 12:00:00', S4C: 0.45, Lat: 14.201, Lon: 101.25 },
        { Satellite: 'G01', Time: '2024-03-01 12:01:00', S4C: 0.31, Lat: 13.722, Lon: 100.51 },
        { Satellite: 'G01', Time: '2024-03-01 12:02:00', S4C: 0.52, Lat: 13.732, Lon: 100.52 },
        { Satellite: 'G05', Time: '2024-03-01 12:02:00', S4C: 0.61, Lat: 14.203, Lon: 101.27 },
        { Satellite: 'G01', Time: '2024-03-01 12:03:00', S4C: 0.18, Lat: 13.742, Lon: 100.53 },
        { Satellite: 'G05', Time: '2024-03-01 12:03:00', S4C: 0.4, Lat: 14.204, Lon: 101.28 },
      ]);
    });

    it('should serve per-satellite statistics', async () => {
      await upload().expect(201);

      const response = await request(app.getHttpServer())
        .get('/stats/satellite')
        .expect(200);

      expect(response.body.map((s: { satellite: string; count: number }) => [s.satellite, s.count])).toEqual([
        ['G01', 4],
        ['G05', 3],
      ]);
    });

    it('should serve one temporal bucket per minute', async () => {
      await upload().expect(201);

      const response = await request(app.getHttpServer())
        .get('/stats/temporal')
        .expect(200);

      expect(response.body.map((s: { timestamp: string; count: number }) => [s.timestamp, s.count])).toEqual([
        ['2024-03-01 12:00:00', 2],
        ['2024-03-01 12:01:00', 1],
        ['2024-03-01 12:02:00', 2],
        ['2024-03-01 12:03:00', 2],
      ]);
    });

    it('should serve the processing summary', async () => {
      await upload().expect(201);

      const response = await request(app.getHttpServer())
        .get('/analysis/summary')
        .expect(200);

      expect(response.body.scintillation_analysis.s4c_value_distribution).toEqual({
        low: 1,
        moderate: 4,
        high: 2,
      });
      expect(response.body.scintillation_analysis.dominant_activity_level).toBe(
        'moderate',
      );
    });
  });

  describe('GET /alerts', () => {
    it('should describe an absent alert log', async () => {
      const response = await request(app.getHttpServer())
        .get('/alerts')
        .expect(200);

      expect(response.body).toEqual({
        state: 'absent',
        entryCount: 0,
        anchor: null,
        anchorAgeDays: null,
        entries: [],
      });
    });
  });

  describe('GET /health', () => {
    it('should report ok with no processing cycle yet', async () => {
      const response = await request(app.getHttpServer())
        .get('/health')
        .expect(200);

      expect(response.body.status).toBe('ok');
      expect(response.body.processing).toEqual({ running: false, lastCycle: null });
    });
  });
});
