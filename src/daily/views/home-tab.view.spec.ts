import { User } from '../../persistence/user.schema';

import {
  buildConfiguredHomeView,
  buildHomeView,
  buildJiraKeysHomeView,
  buildUserNotFoundModal,
} from './home-tab.view';

describe('home tab views', () => {
  const user: User = {
    team: 'core',
    jiraServerUrl: 'https://tracker.test/',
    jiraApiToken: 'test-token',
    jiraEmail: 'dev@example.com',
    jiraHostType: 'Local',
    jiraKeys: [],
    chatData: { teamId: 'T1', teamDomain: 'example', userId: 'U1', userName: 'dev' },
  };

  describe('buildHomeView', () => {
    it('should ask to create a team when there is none', () => {
      const view = buildHomeView([]);

      expect(view.type).toBe('home');
      expect(view.blocks).toHaveLength(14);
      expect(view.blocks[12]).toStrictEqual({
        type: 'section',
        text: { type: 'mrkdwn', text: '*No teams available, use `add-team` command to create one*' },
      });
    });

    it('should pre-fill an existing configuration without the token', () => {
      const view = buildHomeView([{ name: 'core', dailyChannel: 'C1' }], { user });

      expect(view.blocks[5]).toMatchObject({
        block_id: 'jira-server-action',
        element: { initial_value: 'https://tracker.test/' },
      });
      expect(view.blocks[6]).toMatchObject({
        block_id: 'jira-host-type',
        element: { initial_option: { value: 'Local' } },
      });
      expect(view.blocks[9]).toStrictEqual({
        type: 'input',
        block_id: 'jira-api-token-action',
        label: { type: 'plain_text', text: 'Jira API Token' },
        element: { type: 'plain_text_input', action_id: 'jira-api-token-action' },
      });
      expect(view.blocks[12]).toMatchObject({
        block_id: 'select-user-team',
        accessory: { initial_option: { value: 'core' } },
      });
    });

    it('should mention the maintainer when configured', () => {
      const view = buildHomeView([], { adminUserId: 'UADMIN' });

      expect(view.blocks[2]).toMatchObject({
        text: { text: expect.stringContaining('I was created by <@UADMIN> ') },
      });
    });
  });

  describe('buildJiraKeysHomeView', () => {
    const projects = [
      { key: 'CORE', name: 'Core' },
      { key: 'WEB', name: 'Web' },
      { key: 'OPS', name: 'Operations' },
    ];

    it('should offer a multi select when the projects fit', () => {
      const view = buildJiraKeysHomeView(projects, 100);

      expect(view.blocks).toHaveLength(2);
      expect(view.blocks[1]).toMatchObject({
        block_id: 'type-or-select-user-board',
        accessory: {
          type: 'multi_static_select',
          action_id: 'select-user-board',
          options: [{ value: 'CORE' }, { value: 'WEB' }, { value: 'OPS' }],
        },
      });
    });

    it('should ask for typed keys above the selector limit', () => {
      const view = buildJiraKeysHomeView(projects, 2);

      expect(view.blocks.map((block) => block.type)).toStrictEqual([
        'header',
        'input',
        'context',
        'actions',
      ]);
      expect(view.blocks[1]).toMatchObject({
        block_id: 'type-or-select-user-board',
        element: { action_id: 'type-user-board' },
      });
    });

    it('should say when there are no projects', () => {
      const view = buildJiraKeysHomeView([], 100);

      expect(view.blocks[1]).toStrictEqual({
        type: 'section',
        text: { type: 'mrkdwn', text: '*No Jira projects available*' },
      });
    });
  });

  it('should confirm a finished configuration', () => {
    expect(buildConfiguredHomeView().blocks[0]).toStrictEqual({
      type: 'header',
      text: { type: 'plain_text', text: 'Well done! Everything is configured!' },
    });
  });

  it('should offer to edit a finished configuration', () => {
    expect(buildConfiguredHomeView().blocks[3]).toStrictEqual({
      type: 'actions',
      elements: [
        {
          type: 'button',
          action_id: 'edit-user-configurations',
          text: { type: 'plain_text', text: 'Edit configuration' },
          value: 'edit-user-configurations',
        },
      ],
    });
  });

  it('should explain how to register to unknown users', () => {
    const view = buildUserNotFoundModal();

    expect(view.blocks[0]).toStrictEqual({
      type: 'header',
      text: { type: 'plain_text', text: 'Your user is not defined!' },
    });
    expect('submit' in view).toBe(false);
  });
});
