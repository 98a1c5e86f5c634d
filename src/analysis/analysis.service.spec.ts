import { Test, TestingModule } from '@nestjs/testing';
import { AnalysisService } from './analysis.service';
import { IngestionService } from '../ingestion/ingestion.service';
import { MatrixCsvParser } from '../ingestion/strategies/matrix-csv.strategy';
import { MatrixParseError } from '../ingestion/interfaces/matrix.interface';
import { createCsvBuffer } from '../../test/utils/csv-builder';
import {
  matrixSources,
  minuteLabels,
  partialCoverageSources,
} from '../../test/utils/mock-data';

describe('AnalysisService', () => {
  let service: AnalysisService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [AnalysisService, IngestionService, MatrixCsvParser],
    }).compile();

    service = module.get<AnalysisService>(AnalysisService);
  });

  describe('analyze', () => {
    it('should merge only complete cells and report coverage', async () => {
      const result = await service.analyze(partialCoverageSources());

      expect(result.mergedRecords).toHaveLength(15);
      expect(result.normalizedRecords).toHaveLength(15);
      expect(result.envelope.data_coverage).toBe('75.00%');
      expect(result.summary.data_overview.data_completeness_percentage).toBe(75);
      expect(result.load).toEqual({
        timestampCount: 10,
        activeSatellites: ['G01', 'G05'],
        alignmentIssues: [],
      });
    });

    it('should order records by time, then satellite column', async () => {
      const result = await service.analyze(partialCoverageSources());

      expect(
        result.normalizedRecords.slice(0, 4).map((r) => `${r.Time} ${r.Satellite}`),
      ).toEqual([
        '2024-03-01 12:00:00 G01',
        '2024-03-01 12:00:00 G05',
        '2024-03-01 12:01:00 G01',
        '2024-03-01 12:02:00 G01',
      ]);
    });

    it('should compute per-satellite and per-minute statistics', async () => {
      const result = await service.analyze(partialCoverageSources());

      expect(result.satelliteStats).toEqual([
        { satellite: 'G01', count: 10, mean: 0.1, std: 0, min: 0.1, max: 0.1 },
        { satellite: 'G05', count: 5, mean: 0.2, std: 0, min: 0.2, max: 0.2 },
      ]);
      expect(result.temporalStats).toHaveLength(10);
      expect(result.temporalStats[1]).toEqual({
        timestamp: '2024-03-01 12:01:00',
        count: 1,
        mean: 0.1,
        std: null,
      });
    });

    it('should stamp the result with the analysis time', async () => {
      const analyzedAt = new Date('2024-03-01T12:15:00Z');

      const result = await service.analyze(partialCoverageSources(), analyzedAt);

      expect(result.analyzedAt).toBe(analyzedAt);
    });

    it('should return independent results for each call', async () => {
      const first = await service.analyze(partialCoverageSources());
      const second = await service.analyze(
        matrixSources({
          satellites: ['G01'],
          times: minuteLabels(1),
          latitude: () => 10,
          longitude: () => 100,
          s4c: () => 0.9,
        }),
      );

      expect(first.normalizedRecords).toHaveLength(15);
      expect(second.normalizedRecords).toEqual([
        { Satellite: 'G01', Time: '2024-03-01 12:00:00', S4C: 0.9, Lat: 10, Lon: 100 },
      ]);
    });

    it('should succeed with no records when nothing lines up', async () => {
      const result = await service.analyze(
        matrixSources({
          satellites: ['G01'],
          times: minuteLabels(2),
          latitude: () => 10,
          longitude: () => 100,
          s4c: () => null,
        }),
      );

      expect(result.normalizedRecords).toEqual([]);
      expect(result.envelope.data_coverage).toBe('0.00%');
      expect(result.satelliteStats).toEqual([]);
    });

    it('should reject a batch whose matrix cannot be parsed', async () => {
      await expect(
        service.analyze({
          ...partialCoverageSources(),
          s4c: createCsvBuffer([',G01', 'yesterday,0.1']),
        }),
      ).rejects.toThrow(MatrixParseError);
    });
  });
});
