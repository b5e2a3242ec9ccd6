import {
  Block,
  button,
  contextBlock,
  dividerBlock,
  headerBlock,
  markdownText,
  MESSAGE_MAX_BLOCKS,
  messageBlocks,
  plainText,
  SECTION_FIELD_MAX_LENGTH,
  SerializedNode,
  sectionBlock,
} from '../../block-kit';
import { EN } from '../../common/messages/en';
import { Daily, DailyIssueReport, DailyReport } from '../../persistence/daily.schema';
import { ACTION_IDS } from '../daily.constants';

function issueBlocks(userId: string, issue: DailyIssueReport): Block[] {
  const title = issue.summary ? `${issue.key} - ${issue.summary}` : issue.key;

  return [
    sectionBlock({ text: plainText(title, { policy: 'truncate' }) }),
    sectionBlock({
      fields: [
        plainText(issue.status || EN.NO_STATUS, {
          maxLength: SECTION_FIELD_MAX_LENGTH,
          policy: 'truncate',
        }),
        markdownText(`*<@${userId}>*`),
      ],
      accessory: button({
        actionId: ACTION_IDS.OPEN_IN_JIRA,
        text: plainText(EN.OPEN_IN_JIRA),
        value: ACTION_IDS.OPEN_IN_JIRA,
        url: issue.link,
      }),
    }),
    ...(issue.details
      ? [
          sectionBlock({
            text: plainText(EN.SPEECH_BALLOON(issue.details), { emoji: true, policy: 'truncate' }),
          }),
        ]
      : []),
    dividerBlock(),
  ];
}

function generalCommentsBlocks(userId: string, comments: string | undefined): Block[] {
  if (!comments) {
    return [];
  }

  return [
    headerBlock({ text: plainText(EN.GENERAL_COMMENTS_HEADER) }),
    contextBlock({ elements: [markdownText(`<@${userId}>`)] }),
    sectionBlock({ text: markdownText(comments, { policy: 'truncate' }) }),
    dividerBlock(),
  ];
}

function userReportBlocks(userId: string, report: DailyReport): Block[] {
  return [
    ...report.issueReports.flatMap((issue) => issueBlocks(userId, issue)),
    ...generalCommentsBlocks(userId, report.generalComments),
  ];
}

/**
 * Markdown rendering of all reports: one line per issue under each user mention.
 */
export function formatDailyText(daily: Daily): string {
  return Object.entries(daily.reports)
    .map(([userId, report]) => {
      const issues = report.issueReports.map((issue) => {
        const title = issue.link ? `<${issue.link}|${issue.summary ?? issue.key}>` : issue.key;
        const details = issue.details ? ` - ${issue.details}` : '';
        return ` - ${title} - ${issue.status ?? EN.NO_STATUS}${details}`;
      });
      const comments = report.generalComments ? `\n - ${report.generalComments}` : '';
      return [`<@${userId}>:`, ...issues].join('\n') + comments;
    })
    .join('\n');
}

/**
 * Blocks of the message posting a team's daily to its channel.
 *
 * With `withGui` every issue gets its own sections and link button; when that layout would
 * not fit in one message, or without `withGui`, all reports go into one markdown section.
 */
export function buildDailyMessage(daily: Daily, withGui: boolean): SerializedNode[] {
  const heading: Block[] = [
    headerBlock({ text: plainText(EN.DAILY_MESSAGE_HEADER(daily.date)) }),
    contextBlock({ elements: [plainText(EN.DAILY_MESSAGE_HINT)] }),
  ];

  if (withGui) {
    const reportBlocks = Object.entries(daily.reports).flatMap(([userId, report]) =>
      userReportBlocks(userId, report),
    );
    if (heading.length + reportBlocks.length <= MESSAGE_MAX_BLOCKS) {
      return messageBlocks([...heading, ...reportBlocks]);
    }
  }

  const text = formatDailyText(daily);
  const body = text ? [sectionBlock({ text: markdownText(text, { policy: 'truncate' }) })] : [];
  return messageBlocks([...heading, ...body]);
}
