import { Injectable, Logger } from '@nestjs/common';

import { User } from '../../persistence/user.schema';
import { IIssueTrackerService, TrackerIssue, TrackerProject } from '../interfaces';

/**
 * Project key of an issue key ("CORE-12" → "CORE").
 */
export function projectKeyOf(issueKey: string): string {
  const dash = issueKey.lastIndexOf('-');
  return dash === -1 ? issueKey : issueKey.slice(0, dash);
}

/**
 * Issue tracker held in process memory.
 * Stands in for a remote tracker client; seed it with projects, issues and workflows.
 */
@Injectable()
export class InMemoryIssueTrackerService implements IIssueTrackerService {
  private readonly logger = new Logger(InMemoryIssueTrackerService.name);

  private projects: TrackerProject[] = [];

  /** Issues keyed by assignee chat user id */
  private issuesByAssignee = new Map<string, TrackerIssue[]>();

  /** Statuses reachable from each status */
  private transitions = new Map<string, string[]>();

  addProject(project: TrackerProject): void {
    this.projects.push(project);
  }

  assignIssue(userId: string, issue: TrackerIssue): void {
    const issues = this.issuesByAssignee.get(userId) ?? [];
    issues.push(issue);
    this.issuesByAssignee.set(userId, issues);
  }

  setTransitions(fromStatus: string, toStatuses: string[]): void {
    this.transitions.set(fromStatus, toStatuses);
  }

  async getUserIssues(user: User): Promise<TrackerIssue[]> {
    const keys = new Set(user.jiraKeys);
    const issues = (this.issuesByAssignee.get(user.chatData.userId) ?? []).filter((issue) =>
      keys.has(projectKeyOf(issue.key)),
    );
    this.logger.debug(`Found ${issues.length} issues for ${user.chatData.userId}`);
    return issues;
  }

  async getOptionalStatuses(user: User, issueKey: string): Promise<string[]> {
    const issue = (this.issuesByAssignee.get(user.chatData.userId) ?? []).find(
      (i) => i.key === issueKey,
    );

    if (!issue) {
      this.logger.warn(`Issue ${issueKey} not found for ${user.chatData.userId}`);
      return [];
    }

    const reachable = this.transitions.get(issue.status) ?? [];
    return [issue.status, ...reachable.filter((s) => s !== issue.status)];
  }

  async getProjects(_user: User): Promise<TrackerProject[]> {
    return [...this.projects];
  }

  reset(): void {
    this.projects = [];
    this.issuesByAssignee.clear();
    this.transitions.clear();
  }
}
