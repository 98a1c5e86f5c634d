import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { AlertLogRepository } from './alert-log.repository';
import {
  createConfigServiceMock,
  createTempDir,
  removeTempDir,
} from '../../test/utils/test-helpers';
import { normalizedRecord } from '../../test/utils/mock-data';

describe('AlertLogRepository', () => {
  let repository: AlertLogRepository;
  let dataFolder: string;
  let logFile: string;

  beforeEach(async () => {
    dataFolder = await createTempDir();
    logFile = path.join(dataFolder, 'alerts.csv');

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AlertLogRepository,
        {
          provide: ConfigService,
          useValue: createConfigServiceMock({
            DATA_FOLDER: dataFolder,
            ALERT_LOG_FILENAME: 'alerts.csv',
          }),
        },
      ],
    }).compile();

    repository = module.get<AlertLogRepository>(AlertLogRepository);
  });

  afterEach(async () => {
    await removeTempDir(dataFolder);
  });

  it('should resolve the log path inside the data folder', () => {
    expect(repository.filePath).toBe(logFile);
  });

  describe('read', () => {
    it('should report a missing file as absent', async () => {
      await expect(repository.read()).resolves.toEqual({ status: 'absent' });
    });

    it('should load valid rows with numeric fields', async () => {
      await fs.writeFile(
        logFile,
        'Satellite,Time,S4C,Lat,Lon\nG01,2024-03-01 12:00:00,0.45,13.712345,100.5\n',
      );

      await expect(repository.read()).resolves.toEqual({
        status: 'loaded',
        entries: [
          {
            Satellite: 'G01',
            Time: '2024-03-01 12:00:00',
            S4C: 0.45,
            Lat: 13.712345,
            Lon: 100.5,
          },
        ],
      });
    });

    it('should load a header-only file as an empty log', async () => {
      await fs.writeFile(logFile, 'Satellite,Time,S4C,Lat,Lon\n');

      await expect(repository.read()).resolves.toEqual({
        status: 'loaded',
        entries: [],
      });
    });

    it('should accept a BOM before the header', async () => {
      await fs.writeFile(
        logFile,
        '\uFEFFSatellite,Time,S4C,Lat,Lon\nG01,2024-03-01 12:00:00,0.45,13.7,100.5\n',
      );

      const snapshot = await repository.read();

      expect(snapshot.status === 'loaded' && snapshot.entries).toHaveLength(1);
    });

    it('should report an invalid Time as corrupt with its row', async () => {
      await fs.writeFile(
        logFile,
        'Satellite,Time,S4C,Lat,Lon\nG01,yesterday,0.45,13.7,100.5\n',
      );

      await expect(repository.read()).resolves.toEqual({
        status: 'corrupt',
        reason: 'Row 2: Time: expected "YYYY-MM-DD HH:MM:SS"',
      });
    });

    it('should report a non-numeric S4C as corrupt', async () => {
      await fs.writeFile(
        logFile,
        'Satellite,Time,S4C,Lat,Lon\nG01,2024-03-01 12:00:00,0.45,13.7,100.5\nG05,2024-03-01 12:00:00,high,13.7,100.5\n',
      );

      const snapshot = await repository.read();

      expect(snapshot.status).toBe('corrupt');
      expect(snapshot.status === 'corrupt' && snapshot.reason).toMatch(
        /^Row 3: S4C: /,
      );
    });

    it('should report an unexpected header as corrupt', async () => {
      await fs.writeFile(logFile, 'sat,when\nG01,2024-03-01 12:00:00\n');

      const snapshot = await repository.read();

      expect(snapshot.status).toBe('corrupt');
    });

    it('should report an unreadable path as corrupt', async () => {
      await fs.mkdir(logFile);

      const snapshot = await repository.read();

      expect(snapshot.status).toBe('corrupt');
    });
  });

  describe('write', () => {
    it('should write the canonical header and rows', async () => {
      await repository.write([
        normalizedRecord({ Satellite: 'G01', S4C: 0.45 }),
        normalizedRecord({ Satellite: 'G05', S4C: 0.5, Lat: -1.25 }),
      ]);

      await expect(fs.readFile(logFile, 'utf-8')).resolves.toBe(
        'Satellite,Time,S4C,Lat,Lon\n' +
          'G01,2024-03-01 12:00:00,0.45,13.7,100.5\n' +
          'G05,2024-03-01 12:00:00,0.5,-1.25,100.5\n',
      );
    });

    it('should read back what it wrote', async () => {
      const entries = [
        normalizedRecord({ Satellite: 'G01', S4C: 0.45, Lat: 13.712345 }),
      ];

      await repository.write(entries);

      await expect(repository.read()).resolves.toEqual({
        status: 'loaded',
        entries,
      });
    });

    it('should create the data folder when it is missing', async () => {
      await removeTempDir(dataFolder);

      await repository.write([normalizedRecord()]);

      await expect(fs.readdir(dataFolder)).resolves.toEqual(['alerts.csv']);
    });
  });
});
