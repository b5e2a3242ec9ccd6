import {
  actionsBlock,
  Block,
  button,
  charLength,
  checkboxes,
  contextBlock,
  dividerBlock,
  HEADER_TEXT_MAX_LENGTH,
  headerBlock,
  inputBlock,
  InteractiveElement,
  markdownText,
  ModalView,
  modalView,
  Option,
  OPTION_TEXT_MAX_LENGTH,
  OPTION_VALUE_MAX_LENGTH,
  plainText,
  plainTextInput,
  SELECT_MAX_OPTIONS,
  sectionBlock,
  staticSelect,
} from '../../block-kit';
import { EN } from '../../common/messages/en';
import { TrackerIssue } from '../../issue-tracker/interfaces';
import { Daily, DailyIssueReport, DailyReport } from '../../persistence/daily.schema';
import { User } from '../../persistence/user.schema';
import {
  ACTION_IDS,
  DAILY_MODAL_SUBMISSION,
  IGNORE_ISSUE_VALUE,
  issueBlockId,
  MAX_DAILY_FORM_ISSUES,
} from '../daily.constants';

export interface DailyModalInput {
  user: User;
  issues: TrackerIssue[];
  /** Selectable statuses per issue key; the current status is always offered */
  statuses: Record<string, string[]>;
  daily: Daily;
}

/** Metadata carried through the modal so the submission lands on the right day */
export interface DailyModalMetadata {
  date: string;
}

function statusOption(status: string): Option {
  return {
    text: plainText(status, { maxLength: OPTION_TEXT_MAX_LENGTH, policy: 'truncate' }),
    value: status,
  };
}

/**
 * Status select for an issue, led by its current status. Statuses too long to be an option
 * value are left out; with none left the select is omitted.
 */
function statusSelect(issue: TrackerIssue, statuses: string[]): InteractiveElement[] {
  const options = [...new Set([issue.status, ...statuses])]
    .filter((status) => charLength(status) <= OPTION_VALUE_MAX_LENGTH)
    .slice(0, SELECT_MAX_OPTIONS)
    .map(statusOption);

  if (options.length === 0) {
    return [];
  }

  return [
    staticSelect({
      actionId: ACTION_IDS.SELECT_STATUS,
      placeholder: plainText(EN.SELECT_STATUS),
      initialOption: options.find((option) => option.value === issue.status),
      options,
    }),
  ];
}

/**
 * Stored text shown back to the user under an input they may re-fill.
 */
function storedDataContext(text: string | undefined): Block[] {
  if (!text) {
    return [];
  }
  return [contextBlock({ elements: [plainText(EN.STORED_DATA(text), { policy: 'truncate' })] })];
}

/**
 * Blocks for one issue: title, ignore/status/link controls, progress input,
 * previously stored details and a divider.
 */
export function issueReportBlocks(
  issue: TrackerIssue,
  statuses: string[],
  stored: DailyIssueReport | undefined,
): Block[] {
  return [
    headerBlock({
      text: plainText(`${issue.key}: ${issue.summary}`, {
        maxLength: HEADER_TEXT_MAX_LENGTH,
        policy: 'truncate',
      }),
    }),
    actionsBlock({
      blockId: issueBlockId(issue.key, ACTION_IDS.ISSUE_ACTIONS),
      elements: [
        checkboxes({
          actionId: ACTION_IDS.IGNORE_ISSUE,
          options: [{ text: markdownText(EN.IGNORE_ISSUE), value: IGNORE_ISSUE_VALUE }],
        }),
        ...statusSelect(issue, statuses),
        button({
          actionId: ACTION_IDS.ISSUE_LINK,
          text: plainText(EN.OPEN_IN_JIRA),
          value: `link-issue-${issue.key}`,
          url: issue.permalink,
        }),
      ],
    }),
    inputBlock({
      blockId: issueBlockId(issue.key, ACTION_IDS.ISSUE_SUMMARY),
      optional: true,
      label: plainText(EN.PROGRESS_DETAILS),
      element: plainTextInput({ actionId: ACTION_IDS.ISSUE_SUMMARY }),
    }),
    ...storedDataContext(stored?.details),
    dividerBlock(),
  ];
}

/**
 * The daily form modal for a user, pre-filled from what they already stored today.
 */
export function buildDailyModal({ user, issues, statuses, daily }: DailyModalInput): ModalView {
  const report: DailyReport | undefined = daily.reports[user.chatData.userId];
  const storedIssues = new Map((report?.issueReports ?? []).map((r) => [r.key, r]));
  const shown = issues.slice(0, MAX_DAILY_FORM_ISSUES);

  const notices: Block[] = [];
  if (issues.length === 0) {
    notices.push(contextBlock({ elements: [plainText(EN.DAILY_NO_ISSUES)] }));
  } else if (shown.length < issues.length) {
    notices.push(
      contextBlock({ elements: [plainText(EN.DAILY_ISSUES_LIMITED(shown.length, issues.length))] }),
    );
  }

  const metadata: DailyModalMetadata = { date: daily.date };

  return modalView({
    title: plainText(EN.DAILY_TITLE),
    submit: plainText(EN.DAILY_SUBMIT),
    close: plainText(EN.DAILY_CLOSE),
    callbackId: DAILY_MODAL_SUBMISSION,
    privateMetadata: JSON.stringify(metadata),
    blocks: [
      sectionBlock({ text: markdownText(EN.DAILY_INTRO(user.chatData.userId)) }),
      ...notices,
      ...shown.flatMap((issue) =>
        issueReportBlocks(issue, statuses[issue.key] ?? [], storedIssues.get(issue.key)),
      ),
      inputBlock({
        blockId: ACTION_IDS.GENERAL_COMMENTS,
        optional: true,
        label: plainText(EN.GENERAL_COMMENTS_LABEL),
        element: plainTextInput({ actionId: ACTION_IDS.GENERAL_COMMENTS, multiline: true }),
      }),
      ...storedDataContext(report?.generalComments),
    ],
  });
}
