import { Module } from '@nestjs/common';

import { InMemoryIssueTrackerService } from './in-memory/in-memory-issue-tracker.service';
import { ISSUE_TRACKER_SERVICE } from './interfaces';

/**
 * Issue Tracker Module
 *
 * Source of the work items users report on.
 */
@Module({
  providers: [
    InMemoryIssueTrackerService,
    { provide: ISSUE_TRACKER_SERVICE, useExisting: InMemoryIssueTrackerService },
  ],
  exports: [ISSUE_TRACKER_SERVICE, InMemoryIssueTrackerService],
})
export class IssueTrackerModule {}
