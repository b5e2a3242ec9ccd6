/**
 * English user-facing strings.
 * All views and messages should reference strings from this file.
 */
export const EN = {
  // Daily form
  DAILY_TITLE: 'Daily Report',
  DAILY_SUBMIT: 'Submit',
  DAILY_CLOSE: 'Cancel',
  DAILY_INTRO: (userId: string) =>
    `*Hi <@${userId}>!* Please change the statuses of the following issues to the updated ` +
    'status, and add comments on the progress of the issues. If you re-fill this form, copy ' +
    'the stored data to the input box.',
  DAILY_NO_ISSUES: 'No open issues were found in your projects. You can still add general comments.',
  DAILY_ISSUES_LIMITED: (shown: number, total: number) =>
    `Showing ${shown} of your ${total} issues.`,
  IGNORE_ISSUE: 'Ignore this issue',
  SELECT_STATUS: 'Select current status',
  OPEN_IN_JIRA: 'Open in Jira',
  PROGRESS_DETAILS: 'Progress details',
  GENERAL_COMMENTS_LABEL: 'Other comments / blockers',
  STORED_DATA: (text: string) => `Stored data: ${text}`,

  // Home tab: configuration
  HOME_GREETING: "*Hey there! I'm DailyBot :smile:*",
  HOME_ABOUT: (adminUserId?: string) =>
    (adminUserId ? `I was created by <@${adminUserId}> ` : 'I was created ') +
    'to bring happiness to the agile world by skipping dailies and not wasting time each ' +
    'day, and just move these dailies into writing.',
  HOME_CONFIGURE: "Let's configure your profile :gear:",
  JIRA_SERVER_LABEL: 'Jira server url',
  JIRA_SERVER_HINT:
    "https://<your-domain>.atlassian.net/ (if using cloud)  *<!> Don't forget the 'https://'*",
  JIRA_HOST_TYPE_LABEL: 'Select your Jira host type',
  SELECT_OPTIONS: 'Select options',
  JIRA_EMAIL_LABEL: 'Jira E-Mail',
  JIRA_TOKEN_LABEL: 'Jira API Token',
  JIRA_TOKEN_HELP:
    'To generate a Jira API Token go to https://id.atlassian.com/manage-profile/security/api-tokens',
  SELECT_TEAM: '*Select your team*',
  TEAMS_PLACEHOLDER: 'Teams',
  NO_TEAMS: (command: string) => `*No teams available, use \`${command}\` command to create one*`,
  SAVE: 'Save',

  // Home tab: project keys
  CONFIGURATION_SAVED: 'Configuration is set',
  SELECT_BOARDS: '*Select your Jira boards from the select options*',
  NO_PROJECTS: '*No Jira projects available*',
  TYPE_BOARDS_LABEL: 'Please write your issue keys:',
  TYPE_BOARDS_HELP: 'Please write the keys in a list like so: `EDGE,ULT` with , and no spaces',

  // Home tab: done
  ALL_CONFIGURED: 'Well done! Everything is configured!',
  HOW_TO_FILL: (command: string) =>
    `Write \`${command}\` in any channel to fill out the daily form.`,
  COMING_SOON: 'Other capabilities will come soon..',
  EDIT_CONFIGURATION: 'Edit configuration',

  // Unknown user
  USER_NOT_DEFINED: 'Your user is not defined!',
  USER_NOT_DEFINED_HELP:
    'Press the `Add apps` button in the bottom left corner (bottom of the users list) and add ' +
    'the `DailyBot` app, all the configurations are in the home tab. It might not work the ' +
    'first time so please try again :P',

  // Team commands
  TEAM_ADDED: (name: string, channel: string) =>
    `Team *${name}* will get its daily report in <#${channel}>.`,
  ADD_TEAM_USAGE: (command: string) => `Usage: \`${command} <team-name> <#channel>\``,
  TEAM_NAME_TOO_LONG: (max: number) => `Team names can be at most ${max} characters long.`,
  NO_TEAM_FOR_USER: 'You are not part of a team yet. Configure your profile in the home tab.',

  // Daily message
  DAILY_MESSAGE_HEADER: (date: string) => `Daily Report for ${date}`,
  DAILY_MESSAGE_HINT: 'Feel free to extend and comment in the thread.',
  GENERAL_COMMENTS_HEADER: 'General Comments',
  NO_STATUS: 'No status',
  SPEECH_BALLOON: (text: string) => `:speech_balloon: ${text}`,
} as const;
