import { Controller, Get } from '@nestjs/common';
import {
  CycleResult,
  ProcessingCycleService,
} from '../processing/processing-cycle.service';

export interface HealthStatus {
  status: 'ok';
  timestamp: string;
  processing: {
    running: boolean;
    lastCycle: CycleResult | null;
  };
}

@Controller('health')
export class HealthController {
  constructor(private readonly cycleService: ProcessingCycleService) {}

  @Get()
  check(): HealthStatus {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      processing: {
        running: this.cycleService.isRunning(),
        lastCycle: this.cycleService.getLastResult(),
      },
    };
  }
}
