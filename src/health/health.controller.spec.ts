import { Test, TestingModule } from '@nestjs/testing';
import { HealthController } from './health.controller';
import {
  CycleResult,
  ProcessingCycleService,
} from '../processing/processing-cycle.service';

describe('HealthController', () => {
  let controller: HealthController;

  const mockCycleService = {
    isRunning: jest.fn(),
    getLastResult: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    mockCycleService.isRunning.mockReturnValue(false);
    mockCycleService.getLastResult.mockReturnValue(null);

    const module: TestingModule = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        { provide: ProcessingCycleService, useValue: mockCycleService },
      ],
    }).compile();

    controller = module.get<HealthController>(HealthController);
  });

  describe('check', () => {
    it('should return status ok with a valid ISO timestamp', () => {
      const result = controller.check();

      expect(result.status).toBe('ok');
      expect(typeof result.timestamp).toBe('string');
      expect(new Date(result.timestamp).toISOString()).toBe(result.timestamp);
    });

    it('should report no cycle before the first run', () => {
      const result = controller.check();

      expect(result.processing).toEqual({ running: false, lastCycle: null });
    });

    it('should report the last cycle result', () => {
      const lastCycle: CycleResult = {
        status: 'completed',
        startedAt: new Date('2024-03-01T12:15:00Z'),
        durationMs: 42,
        recordsWritten: 15,
        alertUpdate: null,
      };
      mockCycleService.isRunning.mockReturnValue(true);
      mockCycleService.getLastResult.mockReturnValue(lastCycle);

      const result = controller.check();

      expect(result.processing.running).toBe(true);
      expect(result.processing.lastCycle).toBe(lastCycle);
    });
  });
});
