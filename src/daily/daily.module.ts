import { Module } from '@nestjs/common';

import { IssueTrackerModule } from '../issue-tracker/issue-tracker.module';
import { MessagingModule } from '../messaging/messaging.module';
import { PersistenceModule } from '../persistence/persistence.module';

import { DailyListenerService } from './daily-listener.service';
import { DailyReportScheduler } from './daily-report.scheduler';
import { DailyService } from './daily.service';

/**
 * Daily Module
 *
 * Collects daily reports through chat views and posts them to team channels.
 */
@Module({
  imports: [MessagingModule, IssueTrackerModule, PersistenceModule],
  providers: [DailyService, DailyListenerService, DailyReportScheduler],
  exports: [DailyService],
})
export class DailyModule {}
