import * as fs from 'fs/promises';
import * as path from 'path';

import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';

import { HomeView, ModalView } from '../block-kit';
import { InMemoryIssueTrackerService } from '../issue-tracker/in-memory/in-memory-issue-tracker.service';
import { ISSUE_TRACKER_SERVICE } from '../issue-tracker/interfaces';
import { IncomingCommand } from '../messaging/interfaces';
import { MESSAGING_SERVICE } from '../messaging/messaging.constants';
import { OutboxMessagingService } from '../messaging/outbox/outbox-messaging.service';
import { PersistenceService } from '../persistence/persistence.service';
import { User } from '../persistence/user.schema';

import { DailyService } from './daily.service';

describe('DailyService', () => {
  let service: DailyService;
  let persistence: PersistenceService;
  let outbox: OutboxMessagingService;
  let tracker: InMemoryIssueTrackerService;
  let tempDir: string;

  const mockConfigService = {
    get: jest.fn((key: string, defaultValue: unknown) => {
      if (key === 'paths.data') return tempDir;
      return defaultValue;
    }),
  };

  const user: User = {
    team: 'core',
    jiraServerUrl: 'https://tracker.test/',
    jiraApiToken: 'test-token',
    jiraEmail: 'dev@example.com',
    jiraHostType: 'Cloud',
    jiraKeys: ['CORE'],
    chatData: { teamId: 'T1', teamDomain: 'example', userId: 'U1', userName: 'dev' },
  };

  const command = (name: string, text = ''): IncomingCommand => ({
    command: name,
    text,
    userId: 'U1',
    userName: 'dev',
    teamId: 'T1',
    teamDomain: 'example',
    channelId: 'C999',
    triggerId: 'trigger-1',
  });

  const lastModal = (): ModalView => {
    const entry = outbox.getLastEntry();
    if (entry?.kind !== 'modal') throw new Error('expected a modal');
    return entry.view;
  };

  const lastHomeView = (): HomeView => {
    const entry = outbox.getLastEntry();
    if (entry?.kind !== 'home') throw new Error('expected a home view');
    return entry.view;
  };

  const configurationPayload = (team: string | null) => ({
    user: { id: 'U1', name: 'dev' },
    team: { id: 'T1', domain: 'example' },
    view: {
      state: {
        values: {
          'jira-server-action': {
            'jira-server-action': { type: 'plain_text_input', value: 'https://tracker.test/' },
          },
          'jira-host-type': {
            'jira-host-type': { type: 'static_select', selected_option: { value: 'Local' } },
          },
          'jira-email-action': {
            'jira-email-action': { type: 'plain_text_input', value: 'dev@example.com' },
          },
          'jira-api-token-action': {
            'jira-api-token-action': { type: 'plain_text_input', value: 'test-token' },
          },
          'select-user-team': {
            'select-user-team': {
              type: 'static_select',
              selected_option: team === null ? null : { value: team },
            },
          },
        },
      },
    },
  });

  beforeEach(async () => {
    tempDir = path.join(process.cwd(), 'test-data-daily-' + Date.now());
    await fs.mkdir(tempDir, { recursive: true });

    outbox = new OutboxMessagingService();
    tracker = new InMemoryIssueTrackerService();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DailyService,
        PersistenceService,
        { provide: MESSAGING_SERVICE, useValue: outbox },
        { provide: ISSUE_TRACKER_SERVICE, useValue: tracker },
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    service = module.get<DailyService>(DailyService);
    persistence = module.get<PersistenceService>(PersistenceService);
  });

  afterEach(async () => {
    persistence.clearCache();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('handleCommand', () => {
    it('should ignore unknown commands', async () => {
      await service.handleCommand(command('dance'));

      expect(outbox.entries).toHaveLength(0);
    });

    describe('daily', () => {
      it('should explain registration to unknown users', async () => {
        await service.handleCommand(command('daily'));

        const view = lastModal();
        expect(view.blocks[0]).toStrictEqual({
          type: 'header',
          text: { type: 'plain_text', text: 'Your user is not defined!' },
        });
      });

      it('should open the daily form with the user issues', async () => {
        await persistence.saveUser(user);
        tracker.assignIssue('U1', {
          key: 'CORE-1',
          summary: 'Fix login',
          status: 'In Progress',
          permalink: 'https://tracker.test/browse/CORE-1',
        });
        tracker.assignIssue('U1', {
          key: 'WEB-1',
          summary: 'Other project',
          status: 'To Do',
          permalink: 'https://tracker.test/browse/WEB-1',
        });
        tracker.setTransitions('In Progress', ['Done']);

        await service.handleCommand(command('daily'));

        const entry = outbox.getLastEntry();
        expect(entry).toMatchObject({ kind: 'modal', triggerId: 'trigger-1' });
        const view = lastModal();
        expect(view.callback_id).toBe('daily-modal-submission');
        expect(view.blocks).toHaveLength(6);
        expect(view.blocks[1]).toStrictEqual({
          type: 'header',
          text: { type: 'plain_text', text: 'CORE-1: Fix login' },
        });
        expect(view.blocks[2]).toMatchObject({
          block_id: 'CORE-1|actions-issue-daily-form',
          elements: [
            { type: 'checkboxes' },
            { initial_option: { value: 'In Progress' } },
            { url: 'https://tracker.test/browse/CORE-1' },
          ],
        });
      });
    });

    describe('add-team', () => {
      it('should save a team from a channel mention', async () => {
        await service.handleCommand(command('add-team', 'core <#C123|daily>'));

        expect(await persistence.getTeam('core')).toEqual({ name: 'core', dailyChannel: 'C123' });
        expect(outbox.getMessagesTo('C999')[0].text).toBe(
          'Team *core* will get its daily report in <#C123>.',
        );
      });

      it('should save a team from a bare channel id', async () => {
        await service.handleCommand(command('add-team', ' web C456 '));

        expect(await persistence.getTeam('web')).toEqual({ name: 'web', dailyChannel: 'C456' });
      });

      it('should reply with usage when the channel is missing', async () => {
        await service.handleCommand(command('add-team', 'core'));

        expect(await persistence.listTeams()).toEqual([]);
        expect(outbox.getMessagesTo('C999')[0].text).toBe('Usage: `add-team <team-name> <#channel>`');
      });

      it('should refuse a team name longer than an option value', async () => {
        await service.handleCommand(command('add-team', `${'n'.repeat(80)} C123`));

        expect(await persistence.listTeams()).toEqual([]);
        expect(outbox.getMessagesTo('C999')[0].text).toBe(
          'Team names can be at most 75 characters long.',
        );
      });
    });

    describe('daily-report', () => {
      it('should tell unknown users they have no team', async () => {
        await service.handleCommand(command('daily-report'));

        expect(outbox.getMessagesTo('C999')[0].text).toBe(
          'You are not part of a team yet. Configure your profile in the home tab.',
        );
      });

      it('should post the daily of the user team', async () => {
        await persistence.saveUser(user);
        await persistence.saveTeam({ name: 'core', dailyChannel: 'CCORE' });

        await service.handleCommand(command('daily-report'));

        expect(outbox.getMessagesTo('CCORE')).toHaveLength(1);
      });
    });
  });

  describe('handleAppHomeOpened', () => {
    it('should show the configuration form to unknown users', async () => {
      await service.handleAppHomeOpened('U1');

      expect(outbox.getLastEntry()).toMatchObject({ kind: 'home', userId: 'U1' });
      expect(lastHomeView().blocks).toHaveLength(14);
    });

    it('should ask for projects when none are chosen', async () => {
      await persistence.saveUser({ ...user, jiraKeys: [] });
      tracker.addProject({ key: 'CORE', name: 'Core' });

      await service.handleAppHomeOpened('U1');

      expect(lastHomeView().blocks[1]).toMatchObject({
        block_id: 'type-or-select-user-board',
        accessory: { options: [{ value: 'CORE' }] },
      });
    });

    it('should confirm a complete configuration', async () => {
      await persistence.saveUser(user);

      await service.handleAppHomeOpened('U1');

      expect(lastHomeView().blocks[0]).toStrictEqual({
        type: 'header',
        text: { type: 'plain_text', text: 'Well done! Everything is configured!' },
      });
    });
  });

  describe('handleAction', () => {
    it('should save the configuration and keep chosen projects', async () => {
      await persistence.saveUser({ ...user, jiraKeys: ['WEB'] });

      await service.handleAction({
        userId: 'U1',
        actionId: 'save-user-configurations',
        blockId: 'any',
        payload: configurationPayload('core'),
      });

      expect(await persistence.getUser('U1')).toEqual({
        ...user,
        jiraHostType: 'Local',
        jiraKeys: ['WEB'],
      });
      expect(lastHomeView().blocks[0]).toStrictEqual({
        type: 'header',
        text: { type: 'plain_text', text: 'Configuration is set' },
      });
    });

    it('should not save an incomplete configuration', async () => {
      await service.handleAction({
        userId: 'U1',
        actionId: 'save-user-configurations',
        blockId: 'any',
        payload: configurationPayload(null),
      });

      expect(await persistence.getUser('U1')).toBeNull();
      expect(outbox.entries).toHaveLength(0);
    });

    it('should store selected projects', async () => {
      await persistence.saveUser({ ...user, jiraKeys: [] });

      await service.handleAction({
        userId: 'U1',
        actionId: 'select-user-board',
        blockId: 'type-or-select-user-board',
        payload: { actions: [{ action_id: 'select-user-board', selected_options: [{ value: 'CORE' }] }] },
      });

      expect((await persistence.getUser('U1'))?.jiraKeys).toEqual(['CORE']);
      expect(lastHomeView().blocks[0]).toMatchObject({
        text: { text: 'Well done! Everything is configured!' },
      });
    });

    it('should fall back to the configuration form for unknown users', async () => {
      await service.handleAction({
        userId: 'U1',
        actionId: 'select-user-board',
        blockId: 'type-or-select-user-board',
        payload: { actions: [{ action_id: 'select-user-board', selected_options: [{ value: 'CORE' }] }] },
      });

      expect(lastHomeView().blocks).toHaveLength(14);
    });

    it('should reopen the configuration form pre-filled for editing', async () => {
      await persistence.saveUser(user);
      await persistence.saveTeam({ name: 'core', dailyChannel: 'CCORE' });

      await service.handleAction({
        userId: 'U1',
        actionId: 'edit-user-configurations',
        blockId: 'any',
        payload: {},
      });

      const view = lastHomeView();
      expect(view.blocks).toHaveLength(14);
      expect(view.blocks[5]).toMatchObject({
        block_id: 'jira-server-action',
        element: { initial_value: 'https://tracker.test/' },
      });
      expect(view.blocks[7]).toMatchObject({ element: { initial_value: 'dev@example.com' } });
      expect(view.blocks[12]).toMatchObject({ accessory: { initial_option: { value: 'core' } } });
    });

    it('should leave form selections alone', async () => {
      await service.handleAction({
        userId: 'U1',
        actionId: 'select-status-issue-daily-form',
        blockId: 'CORE-1|actions-issue-daily-form',
        payload: {},
      });

      expect(outbox.entries).toHaveLength(0);
    });
  });

  describe('handleViewSubmission', () => {
    const submission = (callbackId: string) => ({
      userId: 'U1',
      callbackId,
      payload: {
        view: {
          callback_id: callbackId,
          private_metadata: '{"date":"2024-05-01"}',
          state: {
            values: {
              'CORE-1|actions-issue-daily-form': {
                'select-status-issue-daily-form': {
                  type: 'static_select',
                  selected_option: { value: 'Done' },
                },
              },
              'general-comments-action': {
                'general-comments-action': { type: 'plain_text_input', value: 'all good' },
              },
            },
          },
        },
      },
    });

    beforeEach(async () => {
      await persistence.saveUser(user);
      tracker.assignIssue('U1', {
        key: 'CORE-1',
        summary: 'Fix login',
        status: 'In Progress',
        permalink: 'https://tracker.test/browse/CORE-1',
      });
    });

    it('should store the report on the date the form was opened for', async () => {
      await service.handleViewSubmission(submission('daily-modal-submission'));

      const daily = await persistence.getDaily('core', '2024-05-01');
      expect(daily.reports).toEqual({
        U1: {
          issueReports: [
            {
              key: 'CORE-1',
              status: 'Done',
              link: 'https://tracker.test/browse/CORE-1',
              summary: 'Fix login',
            },
          ],
          generalComments: 'all good',
        },
      });
    });

    it('should ignore other views', async () => {
      await service.handleViewSubmission(submission('something-else'));

      expect((await persistence.getDaily('core', '2024-05-01')).reports).toEqual({});
    });
  });

  describe('postDailyReport', () => {
    it('should return null for unknown teams', async () => {
      expect(await service.postDailyReport('ghost', '2024-05-01')).toBeNull();
      expect(outbox.entries).toHaveLength(0);
    });

    it('should post the daily to the team channel', async () => {
      await persistence.saveTeam({ name: 'core', dailyChannel: 'CCORE' });

      const result = await service.postDailyReport('core', '2024-05-01');

      expect(result).toMatchObject({ messageId: 'outbox-1', success: true });
      const [message] = outbox.getMessagesTo('CCORE');
      expect(message.text).toBe('Daily Report for 2024-05-01');
      expect(message.blocks[0]).toStrictEqual({
        type: 'header',
        text: { type: 'plain_text', text: 'Daily Report for 2024-05-01' },
      });
    });
  });

  describe('postAllDailyReports', () => {
    it('should only post teams that received reports', async () => {
      await persistence.saveTeam({ name: 'core', dailyChannel: 'CCORE' });
      await persistence.saveTeam({ name: 'web', dailyChannel: 'CWEB' });
      await persistence.saveDaily({
        team: 'core',
        date: '2024-05-01',
        reports: { U1: { issueReports: [], generalComments: 'quiet day' } },
      });

      const posted = await service.postAllDailyReports('2024-05-01');

      expect(posted).toBe(1);
      expect(outbox.getMessagesTo('CCORE')).toHaveLength(1);
      expect(outbox.getMessagesTo('CWEB')).toHaveLength(0);
    });
  });
});
