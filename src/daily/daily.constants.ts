/**
 * Sub-commands of the bot's slash command.
 */
export const COMMANDS = {
  DAILY: 'daily',
  ADD_TEAM: 'add-team',
  DAILY_REPORT: 'daily-report',
} as const;

/** Callback id of the daily form modal */
export const DAILY_MODAL_SUBMISSION = 'daily-modal-submission';

/**
 * Action and block ids used in views; they come back in interaction payloads.
 */
export const ACTION_IDS = {
  // Daily form
  ISSUE_ACTIONS: 'actions-issue-daily-form',
  IGNORE_ISSUE: 'ignore-issue-daily-form',
  SELECT_STATUS: 'select-status-issue-daily-form',
  ISSUE_LINK: 'issue-link-action',
  ISSUE_SUMMARY: 'issue-summary-action',
  GENERAL_COMMENTS: 'general-comments-action',

  // Home tab
  JIRA_SERVER: 'jira-server-action',
  JIRA_HOST_TYPE: 'jira-host-type',
  JIRA_EMAIL: 'jira-email-action',
  JIRA_API_TOKEN: 'jira-api-token-action',
  SELECT_USER_TEAM: 'select-user-team',
  SAVE_USER_CONFIGURATIONS: 'save-user-configurations',
  EDIT_USER_CONFIGURATIONS: 'edit-user-configurations',
  TYPE_OR_SELECT_USER_BOARD: 'type-or-select-user-board',
  SELECT_USER_BOARD: 'select-user-board',
  TYPE_USER_BOARD: 'type-user-board',
  SAVE_USER_BOARD: 'save-user-board',

  // Daily message
  OPEN_IN_JIRA: 'open-in-jira',
} as const;

/** Checkbox value marking an issue as ignored */
export const IGNORE_ISSUE_VALUE = 'ignore-issue';

/**
 * Modals hold at most 100 blocks; each issue takes up to five.
 */
export const MAX_DAILY_FORM_ISSUES = 15;

/**
 * Block id of a per-issue block in the daily form.
 */
export function issueBlockId(issueKey: string, action: string): string {
  return `${issueKey}|${action}`;
}
