import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';

import { DailyService } from './daily.service';

/**
 * Posts every team's daily at the end of each working day.
 */
@Injectable()
export class DailyReportScheduler {
  private readonly logger = new Logger(DailyReportScheduler.name);
  private readonly enabled: boolean;

  constructor(
    private readonly dailyService: DailyService,
    private readonly configService: ConfigService,
  ) {
    this.enabled = this.configService.get<boolean>('daily.scheduled', true);
  }

  @Cron(CronExpression.MONDAY_TO_FRIDAY_AT_6PM)
  async postDailyReports(): Promise<void> {
    if (!this.enabled) {
      this.logger.debug('Scheduled daily reports are disabled');
      return;
    }

    try {
      const posted = await this.dailyService.postAllDailyReports();
      this.logger.log(`Posted ${posted} scheduled daily reports`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Scheduled daily reports failed: ${message}`);
    }
  }
}
