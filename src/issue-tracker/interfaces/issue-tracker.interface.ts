import { User } from '../../persistence/user.schema';

/**
 * Injection token for the issue tracker service.
 */
export const ISSUE_TRACKER_SERVICE = Symbol('ISSUE_TRACKER_SERVICE');

/**
 * A work item as the daily form needs it.
 */
export interface TrackerIssue {
  /** Issue key (e.g., "CORE-12") */
  key: string;
  summary: string;
  /** Current status name */
  status: string;
  /** Browser link to the issue */
  permalink: string;
}

export interface TrackerProject {
  key: string;
  name: string;
}

/**
 * Abstract issue tracker client.
 * Implementations authenticate with the user's stored tracker credentials.
 */
export interface IIssueTrackerService {
  /** Open issues assigned to the user in the projects they report on */
  getUserIssues(user: User): Promise<TrackerIssue[]>;

  /** Statuses the issue can currently be moved to, including its current one */
  getOptionalStatuses(user: User, issueKey: string): Promise<string[]>;

  /** Projects visible to the user */
  getProjects(user: User): Promise<TrackerProject[]>;
}
