import { TrackerIssue } from '../../issue-tracker/interfaces';
import { Daily } from '../../persistence/daily.schema';
import { User } from '../../persistence/user.schema';

import { buildDailyModal } from './daily-modal.view';

describe('buildDailyModal', () => {
  const user: User = {
    team: 'core',
    jiraServerUrl: 'https://tracker.test/',
    jiraApiToken: 'test-token',
    jiraEmail: 'dev@example.com',
    jiraHostType: 'Cloud',
    jiraKeys: ['CORE'],
    chatData: { teamId: 'T1', teamDomain: 'example', userId: 'U1', userName: 'dev' },
  };

  const issue = (n: number, summary = 'Fix login'): TrackerIssue => ({
    key: `CORE-${n}`,
    summary,
    status: 'In Progress',
    permalink: `https://tracker.test/browse/CORE-${n}`,
  });

  const emptyDaily: Daily = { team: 'core', date: '2024-05-01', reports: {} };

  it('should build the form for one issue', () => {
    const view = buildDailyModal({
      user,
      issues: [issue(1)],
      statuses: { 'CORE-1': ['In Progress', 'Done'] },
      daily: emptyDaily,
    });

    expect(view.type).toBe('modal');
    expect(view.callback_id).toBe('daily-modal-submission');
    expect(view.private_metadata).toBe('{"date":"2024-05-01"}');
    expect(view.title).toStrictEqual({ type: 'plain_text', text: 'Daily Report' });
    expect(view.blocks.map((block) => block.type)).toStrictEqual([
      'section',
      'header',
      'actions',
      'input',
      'divider',
      'input',
    ]);
    expect(view.blocks[1]).toStrictEqual({
      type: 'header',
      text: { type: 'plain_text', text: 'CORE-1: Fix login' },
    });
  });

  it('should offer the current status first and preselect it', () => {
    const view = buildDailyModal({
      user,
      issues: [issue(1)],
      statuses: { 'CORE-1': ['Done', 'In Progress', 'Blocked'] },
      daily: emptyDaily,
    });

    const inProgress = { text: { type: 'plain_text', text: 'In Progress' }, value: 'In Progress' };
    expect(view.blocks[2]).toStrictEqual({
      type: 'actions',
      block_id: 'CORE-1|actions-issue-daily-form',
      elements: [
        {
          type: 'checkboxes',
          action_id: 'ignore-issue-daily-form',
          options: [{ text: { type: 'mrkdwn', text: 'Ignore this issue' }, value: 'ignore-issue' }],
        },
        {
          type: 'static_select',
          action_id: 'select-status-issue-daily-form',
          placeholder: { type: 'plain_text', text: 'Select current status' },
          options: [
            inProgress,
            { text: { type: 'plain_text', text: 'Done' }, value: 'Done' },
            { text: { type: 'plain_text', text: 'Blocked' }, value: 'Blocked' },
          ],
          initial_option: inProgress,
        },
        {
          type: 'button',
          action_id: 'issue-link-action',
          text: { type: 'plain_text', text: 'Open in Jira' },
          url: 'https://tracker.test/browse/CORE-1',
          value: 'link-issue-CORE-1',
        },
      ],
    });
  });

  it('should leave out statuses too long to be an option value', () => {
    const longStatus = 'S'.repeat(80);
    const view = buildDailyModal({
      user,
      issues: [{ ...issue(1), status: longStatus }],
      statuses: { 'CORE-1': [longStatus, 'Done'] },
      daily: emptyDaily,
    });

    expect(view.blocks[2]).toMatchObject({
      elements: [
        { type: 'checkboxes' },
        {
          type: 'static_select',
          options: [{ text: { type: 'plain_text', text: 'Done' }, value: 'Done' }],
        },
        { type: 'button' },
      ],
    });
    expect(view.blocks[2]).not.toHaveProperty('elements.1.initial_option');
  });

  it('should omit the status select when no status fits', () => {
    const longStatus = 'S'.repeat(80);
    const view = buildDailyModal({
      user,
      issues: [{ ...issue(1), status: longStatus }],
      statuses: { 'CORE-1': ['T'.repeat(76)] },
      daily: emptyDaily,
    });

    expect(view.blocks[2]).toMatchObject({
      elements: [{ type: 'checkboxes' }, { type: 'button' }],
    });
  });

  it('should show what was stored earlier today', () => {
    const daily: Daily = {
      ...emptyDaily,
      reports: {
        U1: { issueReports: [{ key: 'CORE-1', details: 'halfway' }], generalComments: 'blocked' },
      },
    };

    const view = buildDailyModal({ user, issues: [issue(1)], statuses: {}, daily });

    expect(view.blocks).toHaveLength(8);
    expect(view.blocks[4]).toStrictEqual({
      type: 'context',
      elements: [{ type: 'plain_text', text: 'Stored data: halfway' }],
    });
    expect(view.blocks[7]).toStrictEqual({
      type: 'context',
      elements: [{ type: 'plain_text', text: 'Stored data: blocked' }],
    });
  });

  it('should truncate long issue titles in the header', () => {
    const view = buildDailyModal({
      user,
      issues: [issue(1, 'x'.repeat(200))],
      statuses: {},
      daily: emptyDaily,
    });

    expect(view.blocks[1]).toStrictEqual({
      type: 'header',
      text: { type: 'plain_text', text: `CORE-1: ${'x'.repeat(139)}...` },
    });
  });

  it('should note when there are no issues', () => {
    const view = buildDailyModal({ user, issues: [], statuses: {}, daily: emptyDaily });

    expect(view.blocks).toHaveLength(3);
    expect(view.blocks[1]).toStrictEqual({
      type: 'context',
      elements: [
        {
          type: 'plain_text',
          text: 'No open issues were found in your projects. You can still add general comments.',
        },
      ],
    });
  });

  it('should limit the form to 15 issues', () => {
    const issues = Array.from({ length: 20 }, (_, i) => issue(i + 1));

    const view = buildDailyModal({ user, issues, statuses: {}, daily: emptyDaily });

    expect(view.blocks).toHaveLength(63);
    expect(view.blocks[1]).toStrictEqual({
      type: 'context',
      elements: [{ type: 'plain_text', text: 'Showing 15 of your 20 issues.' }],
    });
  });
});
