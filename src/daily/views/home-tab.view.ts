import {
  actionsBlock,
  Block,
  button,
  ButtonStyle,
  contextBlock,
  dividerBlock,
  headerBlock,
  HomeView,
  homeView,
  inputBlock,
  markdownText,
  modalView,
  ModalView,
  multiStaticSelect,
  Option,
  OPTION_TEXT_MAX_LENGTH,
  plainText,
  plainTextInput,
  SELECT_MAX_OPTIONS,
  sectionBlock,
  staticSelect,
} from '../../block-kit';
import { EN } from '../../common/messages/en';
import { TrackerProject } from '../../issue-tracker/interfaces';
import { Team } from '../../persistence/team.schema';
import { JIRA_HOST_TYPES, JiraHostType, User } from '../../persistence/user.schema';
import { ACTION_IDS, COMMANDS } from '../daily.constants';

export interface HomeViewOptions {
  /** Mentioned as the bot's maintainer */
  adminUserId?: string;
  /** Existing configuration to pre-fill; the API token is never echoed back */
  user?: User | null;
}

function labelledOption(label: string, value: string = label): Option {
  return {
    text: plainText(label, { maxLength: OPTION_TEXT_MAX_LENGTH, policy: 'truncate' }),
    value,
  };
}

function teamPicker(teams: Team[], current?: string): Block {
  if (teams.length === 0) {
    return sectionBlock({ text: markdownText(EN.NO_TEAMS(COMMANDS.ADD_TEAM)) });
  }

  const options = teams.slice(0, SELECT_MAX_OPTIONS).map((team) => labelledOption(team.name));
  const initialOption = options.find((option) => option.value === current);

  return sectionBlock({
    blockId: ACTION_IDS.SELECT_USER_TEAM,
    text: markdownText(EN.SELECT_TEAM),
    accessory: staticSelect({
      actionId: ACTION_IDS.SELECT_USER_TEAM,
      placeholder: plainText(EN.TEAMS_PLACEHOLDER),
      options,
      initialOption,
    }),
  });
}

/**
 * Home tab for users who have not configured their tracker credentials yet.
 */
export function buildHomeView(teams: Team[], options: HomeViewOptions = {}): HomeView {
  const { user } = options;
  const hostTypes = JIRA_HOST_TYPES.map((hostType) => labelledOption(hostType));
  const currentHostType: JiraHostType = user?.jiraHostType ?? 'Cloud';

  return homeView({
    blocks: [
      sectionBlock({ text: markdownText(EN.HOME_GREETING) }),
      dividerBlock(),
      sectionBlock({ text: markdownText(EN.HOME_ABOUT(options.adminUserId)) }),
      sectionBlock({ text: markdownText(EN.HOME_CONFIGURE) }),
      dividerBlock(),
      inputBlock({
        blockId: ACTION_IDS.JIRA_SERVER,
        label: plainText(EN.JIRA_SERVER_LABEL),
        hint: plainText(EN.JIRA_SERVER_HINT, { emoji: false }),
        element: plainTextInput({
          actionId: ACTION_IDS.JIRA_SERVER,
          initialValue: user?.jiraServerUrl,
        }),
      }),
      inputBlock({
        blockId: ACTION_IDS.JIRA_HOST_TYPE,
        label: plainText(EN.JIRA_HOST_TYPE_LABEL),
        element: staticSelect({
          actionId: ACTION_IDS.JIRA_HOST_TYPE,
          placeholder: plainText(EN.SELECT_OPTIONS),
          initialOption: labelledOption(currentHostType),
          options: hostTypes,
        }),
      }),
      inputBlock({
        blockId: ACTION_IDS.JIRA_EMAIL,
        label: plainText(EN.JIRA_EMAIL_LABEL),
        element: plainTextInput({ actionId: ACTION_IDS.JIRA_EMAIL, initialValue: user?.jiraEmail }),
      }),
      dividerBlock(),
      inputBlock({
        blockId: ACTION_IDS.JIRA_API_TOKEN,
        label: plainText(EN.JIRA_TOKEN_LABEL),
        element: plainTextInput({ actionId: ACTION_IDS.JIRA_API_TOKEN }),
      }),
      contextBlock({ elements: [markdownText(EN.JIRA_TOKEN_HELP)] }),
      dividerBlock(),
      teamPicker(teams, user?.team),
      actionsBlock({
        elements: [
          button({
            actionId: ACTION_IDS.SAVE_USER_CONFIGURATIONS,
            text: plainText(EN.SAVE),
            value: ACTION_IDS.SAVE_USER_CONFIGURATIONS,
            style: ButtonStyle.Primary,
          }),
        ],
      }),
    ],
  });
}

/**
 * Home tab asking for the projects to report on: a multi select when the projects fit in
 * one menu, otherwise a free-text list of keys.
 */
export function buildJiraKeysHomeView(
  projects: TrackerProject[],
  maxSelectorOptions: number,
): HomeView {
  const fitsSelector = projects.length <= Math.min(maxSelectorOptions, SELECT_MAX_OPTIONS);
  let picker: Block[];

  if (projects.length === 0) {
    picker = [sectionBlock({ text: markdownText(EN.NO_PROJECTS) })];
  } else if (fitsSelector) {
    picker = [
      sectionBlock({
        blockId: ACTION_IDS.TYPE_OR_SELECT_USER_BOARD,
        text: markdownText(EN.SELECT_BOARDS),
        accessory: multiStaticSelect({
          actionId: ACTION_IDS.SELECT_USER_BOARD,
          placeholder: plainText(EN.SELECT_OPTIONS),
          options: projects.map((project) => labelledOption(project.key)),
        }),
      }),
    ];
  } else {
    picker = [
      inputBlock({
        blockId: ACTION_IDS.TYPE_OR_SELECT_USER_BOARD,
        label: plainText(EN.TYPE_BOARDS_LABEL),
        element: plainTextInput({ actionId: ACTION_IDS.TYPE_USER_BOARD }),
      }),
      contextBlock({ elements: [plainText(EN.TYPE_BOARDS_HELP)] }),
      actionsBlock({
        elements: [
          button({
            actionId: ACTION_IDS.SAVE_USER_BOARD,
            text: plainText(EN.DAILY_SUBMIT),
            value: ACTION_IDS.SAVE_USER_BOARD,
          }),
        ],
      }),
    ];
  }

  return homeView({
    blocks: [headerBlock({ text: plainText(EN.CONFIGURATION_SAVED) }), ...picker],
  });
}

export function buildConfiguredHomeView(): HomeView {
  return homeView({
    blocks: [
      headerBlock({ text: plainText(EN.ALL_CONFIGURED) }),
      sectionBlock({ text: markdownText(EN.HOW_TO_FILL(COMMANDS.DAILY)) }),
      contextBlock({ elements: [plainText(EN.COMING_SOON)] }),
      actionsBlock({
        elements: [
          button({
            actionId: ACTION_IDS.EDIT_USER_CONFIGURATIONS,
            text: plainText(EN.EDIT_CONFIGURATION),
            value: ACTION_IDS.EDIT_USER_CONFIGURATIONS,
          }),
        ],
      }),
    ],
  });
}

/**
 * Shown instead of the daily form to users the bot does not know yet.
 */
export function buildUserNotFoundModal(): ModalView {
  return modalView({
    title: plainText(EN.DAILY_TITLE),
    blocks: [
      headerBlock({ text: plainText(EN.USER_NOT_DEFINED) }),
      sectionBlock({ text: markdownText(EN.USER_NOT_DEFINED_HELP) }),
    ],
  });
}
