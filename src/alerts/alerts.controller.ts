import { Controller, Get, Logger } from '@nestjs/common';
import { AlertLogService } from './alert-log.service';
import { AlertLogDescription } from './interfaces/alert-log.interface';

/**
 * AlertsController
 *
 * Endpoints:
 * - GET /alerts - Alert log state, anchor and entries
 */
@Controller('alerts')
export class AlertsController {
  private readonly logger = new Logger(AlertsController.name);

  constructor(private readonly alertLogService: AlertLogService) {}

  @Get()
  async getAlertLog(): Promise<AlertLogDescription> {
    const description = await this.alertLogService.describe();
    this.logger.log(
      `GET /alerts: ${description.state}, ${description.entryCount} entries`,
    );
    return description;
  }
}
