import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { format } from 'date-fns';

import { createEmptyDaily, Daily, dailyId, validateDaily } from './daily.schema';
import { JsonCollection } from './json-collection';
import { Team, validateTeam } from './team.schema';
import { User, validateUser } from './user.schema';

export const USERS_COLLECTION = 'users';
export const TEAMS_COLLECTION = 'teams';
export const DAILIES_COLLECTION = 'dailies';

/**
 * Service for persisting users, teams and dailies.
 * Each collection is a JSON document file under the configured data directory.
 */
@Injectable()
export class PersistenceService {
  private readonly logger = new Logger(PersistenceService.name);

  private readonly users: JsonCollection<User>;
  private readonly teams: JsonCollection<Team>;
  private readonly dailies: JsonCollection<Daily>;

  constructor(private readonly configService: ConfigService) {
    const dataDir = this.configService.get<string>('paths.data', './data');

    this.users = new JsonCollection(dataDir, USERS_COLLECTION, validateUser);
    this.teams = new JsonCollection(dataDir, TEAMS_COLLECTION, validateTeam);
    this.dailies = new JsonCollection(dataDir, DAILIES_COLLECTION, validateDaily);
  }

  // ── Dailies ────────────────────────────────────────────

  /**
   * Get a team's daily for a date (today by default).
   * Returns an empty, unsaved daily when none is stored.
   */
  async getDaily(team: string, date: string = today()): Promise<Daily> {
    const stored = await this.dailies.findOne(dailyId(date, team));
    return stored ?? createEmptyDaily(team, date);
  }

  async saveDaily(daily: Daily): Promise<Daily> {
    return this.dailies.replaceOne(dailyId(daily.date, daily.team), daily);
  }

  // ── Teams ──────────────────────────────────────────────

  async getTeam(name: string): Promise<Team | null> {
    return this.teams.findOne(name);
  }

  async listTeams(): Promise<Team[]> {
    return this.teams.findAll();
  }

  async saveTeam(team: Team): Promise<Team> {
    const saved = await this.teams.replaceOne(team.name, team);
    this.logger.log(`Saved team ${team.name} (channel ${team.dailyChannel})`);
    return saved;
  }

  // ── Users ──────────────────────────────────────────────

  async getUser(userId: string): Promise<User | null> {
    return this.users.findOne(userId);
  }

  async listUsers(): Promise<User[]> {
    return this.users.findAll();
  }

  async saveUser(user: User): Promise<User> {
    const saved = await this.users.replaceOne(user.chatData.userId, user);
    this.logger.log(`Saved user ${user.chatData.userName} (${user.chatData.userId})`);
    return saved;
  }

  /**
   * Replace the project keys a user reports on.
   * Returns null when the user is not configured.
   */
  async updateJiraKeys(userId: string, jiraKeys: string[]): Promise<User | null> {
    const user = await this.users.findOne(userId);

    if (!user) {
      this.logger.warn(`Cannot set Jira keys: user ${userId} not found`);
      return null;
    }

    return this.users.replaceOne(userId, { ...user, jiraKeys });
  }

  /**
   * Drop all cached documents so the next read goes back to disk.
   */
  clearCache(): void {
    this.users.invalidate();
    this.teams.invalidate();
    this.dailies.invalidate();
  }
}

function today(): string {
  return format(new Date(), 'yyyy-MM-dd');
}
