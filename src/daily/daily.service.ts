import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import {
  charLength,
  markdownText,
  messageBlocks,
  OPTION_VALUE_MAX_LENGTH,
  sectionBlock,
} from '../block-kit';
import { EN } from '../common/messages/en';
import { IIssueTrackerService, ISSUE_TRACKER_SERVICE } from '../issue-tracker/interfaces';
import {
  IMessagingService,
  IncomingBlockAction,
  IncomingCommand,
  IncomingViewSubmission,
  SentMessageResult,
} from '../messaging/interfaces';
import { MESSAGING_SERVICE } from '../messaging/messaging.constants';
import { PersistenceService } from '../persistence/persistence.service';
import { User } from '../persistence/user.schema';

import { ACTION_IDS, COMMANDS, DAILY_MODAL_SUBMISSION, MAX_DAILY_FORM_ISSUES } from './daily.constants';
import {
  InteractionParseError,
  parseDailyModalMetadata,
  parseDailySubmission,
  parseJiraKeys,
  parseUserConfiguration,
  parseViewState,
} from './interactions/interaction.parser';
import {
  buildConfiguredHomeView,
  buildDailyMessage,
  buildDailyModal,
  buildHomeView,
  buildJiraKeysHomeView,
  buildUserNotFoundModal,
} from './views';

/** "core <#C123|daily>" or "core C123" */
const ADD_TEAM_PATTERN = /^(\S+)\s+(?:<#([A-Z0-9]+)(?:\|[^>]*)?>|#?([A-Z0-9]+))$/;

type CommandHandler = (command: IncomingCommand) => Promise<void>;

/**
 * Daily report workflow: commands, home tab configuration, form submission and posting.
 */
@Injectable()
export class DailyService {
  private readonly logger = new Logger(DailyService.name);

  private readonly withGui: boolean;
  private readonly maxSelectorOptions: number;
  private readonly adminUserId?: string;

  /** Command dispatch map */
  private readonly commands: Map<string, CommandHandler>;

  constructor(
    @Inject(MESSAGING_SERVICE) private readonly messaging: IMessagingService,
    @Inject(ISSUE_TRACKER_SERVICE) private readonly tracker: IIssueTrackerService,
    private readonly persistenceService: PersistenceService,
    private readonly configService: ConfigService,
  ) {
    this.withGui = this.configService.get<boolean>('daily.withGui', true);
    this.maxSelectorOptions = this.configService.get<number>('issueTracker.maxSelectorOptions', 100);
    this.adminUserId = this.configService.get<string>('home.adminUserId');

    this.commands = new Map<string, CommandHandler>([
      [COMMANDS.DAILY, this.openDailyForm.bind(this)],
      [COMMANDS.ADD_TEAM, this.addTeam.bind(this)],
      [COMMANDS.DAILY_REPORT, this.postOwnTeamReport.bind(this)],
    ]);
  }

  // ── Commands ───────────────────────────────────────────

  async handleCommand(command: IncomingCommand): Promise<void> {
    const handler = this.commands.get(command.command);

    if (!handler) {
      this.logger.warn(`Unknown command "${command.command}" from ${command.userId}`);
      return;
    }

    await handler(command);
  }

  /**
   * Open the daily form, or explain how to get configured.
   */
  private async openDailyForm(command: IncomingCommand): Promise<void> {
    const user = await this.persistenceService.getUser(command.userId);

    if (!user) {
      this.logger.log(`Unknown user ${command.userId} asked for the daily form`);
      await this.messaging.openModal(command.triggerId, buildUserNotFoundModal());
      return;
    }

    const issues = await this.tracker.getUserIssues(user);
    const shown = issues.slice(0, MAX_DAILY_FORM_ISSUES);
    const statusLists = await Promise.all(
      shown.map((issue) => this.tracker.getOptionalStatuses(user, issue.key)),
    );
    const statuses = Object.fromEntries(shown.map((issue, i) => [issue.key, statusLists[i]]));
    const daily = await this.persistenceService.getDaily(user.team);

    await this.messaging.openModal(
      command.triggerId,
      buildDailyModal({ user, issues, statuses, daily }),
    );
    this.logger.debug(`Opened daily form for ${user.chatData.userId} with ${shown.length} issues`);
  }

  private async addTeam(command: IncomingCommand): Promise<void> {
    const match = ADD_TEAM_PATTERN.exec(command.text.trim());
    let text: string;
    if (!match) {
      text = EN.ADD_TEAM_USAGE(COMMANDS.ADD_TEAM);
    } else if (charLength(match[1]) > OPTION_VALUE_MAX_LENGTH) {
      text = EN.TEAM_NAME_TOO_LONG(OPTION_VALUE_MAX_LENGTH);
    } else {
      text = await this.saveTeam(match[1], match[2] ?? match[3]);
    }

    await this.messaging.postMessage(
      command.channelId,
      messageBlocks([sectionBlock({ text: markdownText(text) })]),
      text,
    );
  }

  private async saveTeam(name: string, channel: string): Promise<string> {
    await this.persistenceService.saveTeam({ name, dailyChannel: channel });
    return EN.TEAM_ADDED(name, channel);
  }

  private async postOwnTeamReport(command: IncomingCommand): Promise<void> {
    const user = await this.persistenceService.getUser(command.userId);

    if (!user) {
      await this.messaging.postMessage(
        command.channelId,
        messageBlocks([sectionBlock({ text: markdownText(EN.NO_TEAM_FOR_USER) })]),
        EN.NO_TEAM_FOR_USER,
      );
      return;
    }

    await this.postDailyReport(user.team);
  }

  // ── Home tab ───────────────────────────────────────────

  /**
   * Publish the home tab matching how far the user got with configuration.
   */
  async handleAppHomeOpened(userId: string): Promise<void> {
    const user = await this.persistenceService.getUser(userId);

    if (!user) {
      await this.publishConfigurationForm(userId, null);
    } else if (user.jiraKeys.length === 0) {
      await this.publishJiraKeysPicker(user);
    } else {
      await this.messaging.publishHomeView(userId, buildConfiguredHomeView());
    }
  }

  /**
   * Configuration form, pre-filled from the user's stored settings when there are any.
   */
  private async publishConfigurationForm(userId: string, user: User | null): Promise<void> {
    const teams = await this.persistenceService.listTeams();
    await this.messaging.publishHomeView(
      userId,
      buildHomeView(teams, { adminUserId: this.adminUserId, user }),
    );
  }

  private async publishJiraKeysPicker(user: User): Promise<void> {
    const projects = await this.tracker.getProjects(user);
    await this.messaging.publishHomeView(
      user.chatData.userId,
      buildJiraKeysHomeView(projects, this.maxSelectorOptions),
    );
  }

  // ── Actions ────────────────────────────────────────────

  async handleAction(action: IncomingBlockAction): Promise<void> {
    switch (action.actionId) {
      case ACTION_IDS.SAVE_USER_CONFIGURATIONS:
        await this.saveUserConfiguration(action);
        return;

      case ACTION_IDS.SELECT_USER_BOARD:
      case ACTION_IDS.SAVE_USER_BOARD:
        await this.saveJiraKeys(action);
        return;

      case ACTION_IDS.EDIT_USER_CONFIGURATIONS:
        await this.publishConfigurationForm(
          action.userId,
          await this.persistenceService.getUser(action.userId),
        );
        return;

      default:
        // Selections inside forms are read on submission
        this.logger.debug(`No handler for action ${action.actionId} in ${action.blockId}`);
    }
  }

  private async saveUserConfiguration(action: IncomingBlockAction): Promise<void> {
    let configured: User;
    try {
      configured = parseUserConfiguration(action.payload);
    } catch (error) {
      if (error instanceof InteractionParseError) {
        this.logger.warn(`Rejected configuration from ${action.userId}: ${error.message}`);
        return;
      }
      throw error;
    }

    const existing = await this.persistenceService.getUser(configured.chatData.userId);
    const user = await this.persistenceService.saveUser({
      ...configured,
      jiraKeys: existing?.jiraKeys ?? [],
    });

    await this.publishJiraKeysPicker(user);
  }

  private async saveJiraKeys(action: IncomingBlockAction): Promise<void> {
    let keys: string[];
    try {
      keys = parseJiraKeys(action.payload, action.actionId);
    } catch (error) {
      if (error instanceof InteractionParseError) {
        this.logger.warn(`Rejected project keys from ${action.userId}: ${error.message}`);
        return;
      }
      throw error;
    }

    const user = await this.persistenceService.updateJiraKeys(action.userId, keys);
    if (!user) {
      await this.publishConfigurationForm(action.userId, null);
      return;
    }

    // An emptied selection keeps the picker open
    if (keys.length > 0) {
      await this.messaging.publishHomeView(action.userId, buildConfiguredHomeView());
    }
  }

  // ── Form submission ────────────────────────────────────

  async handleViewSubmission(submission: IncomingViewSubmission): Promise<void> {
    if (submission.callbackId !== DAILY_MODAL_SUBMISSION) {
      this.logger.debug(`Ignoring submission of view ${submission.callbackId}`);
      return;
    }

    const user = await this.persistenceService.getUser(submission.userId);
    if (!user) {
      this.logger.warn(`Daily submitted by unknown user ${submission.userId}`);
      return;
    }

    const values = parseViewState(submission.payload);
    const metadata = parseDailyModalMetadata(submission.payload);
    const issues = await this.tracker.getUserIssues(user);
    const report = parseDailySubmission(values, issues);

    const daily = await this.persistenceService.getDaily(user.team, metadata?.date);
    await this.persistenceService.saveDaily({
      ...daily,
      reports: { ...daily.reports, [user.chatData.userId]: report },
    });

    this.logger.log(
      `Stored daily of ${user.chatData.userName} for ${daily.date} (${report.issueReports.length} issues)`,
    );
  }

  // ── Posting ────────────────────────────────────────────

  /**
   * Post a team's daily to its channel.
   * Returns null when the team is unknown.
   */
  async postDailyReport(teamName: string, date?: string): Promise<SentMessageResult | null> {
    const team = await this.persistenceService.getTeam(teamName);

    if (!team) {
      this.logger.warn(`Cannot post daily: team ${teamName} not found`);
      return null;
    }

    const daily = await this.persistenceService.getDaily(team.name, date);
    const blocks = buildDailyMessage(daily, this.withGui);
    const result = await this.messaging.postMessage(
      team.dailyChannel,
      blocks,
      EN.DAILY_MESSAGE_HEADER(daily.date),
    );

    this.logger.log(`Posted daily of ${team.name} for ${daily.date} to ${team.dailyChannel}`);
    return result;
  }

  /**
   * Post the daily of every team that received at least one report.
   * Returns the number of reports posted.
   */
  async postAllDailyReports(date?: string): Promise<number> {
    const teams = await this.persistenceService.listTeams();
    let posted = 0;

    for (const team of teams) {
      const daily = await this.persistenceService.getDaily(team.name, date);
      if (Object.keys(daily.reports).length === 0) {
        this.logger.debug(`No reports for ${team.name} on ${daily.date}`);
        continue;
      }

      if (await this.postDailyReport(team.name, daily.date)) {
        posted++;
      }
    }

    return posted;
  }
}
