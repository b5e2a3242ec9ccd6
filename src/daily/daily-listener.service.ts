import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';

import {
  AppHomeOpenedEvent,
  BlockActionReceivedEvent,
  CommandReceivedEvent,
  ViewSubmittedEvent,
} from '../messaging/events';
import { MSG_EVENTS } from '../messaging/messaging.constants';

import { DailyService } from './daily.service';

/**
 * Event listener that routes incoming chat traffic to the DailyService.
 * Separates event handling concerns from the daily workflow.
 */
@Injectable()
export class DailyListenerService {
  private readonly logger = new Logger(DailyListenerService.name);

  constructor(private readonly dailyService: DailyService) {}

  @OnEvent(MSG_EVENTS.COMMAND_RECEIVED)
  async handleCommand({ event }: CommandReceivedEvent): Promise<void> {
    this.logger.debug(`Command "${event.command}" from ${event.userId}`);

    try {
      await this.dailyService.handleCommand(event);
    } catch (error) {
      this.logError('command', error);
    }
  }

  @OnEvent(MSG_EVENTS.APP_HOME_OPENED)
  async handleAppHomeOpened({ event }: AppHomeOpenedEvent): Promise<void> {
    this.logger.debug(`Home tab opened by ${event.userId}`);

    try {
      await this.dailyService.handleAppHomeOpened(event.userId);
    } catch (error) {
      this.logError('app home', error);
    }
  }

  @OnEvent(MSG_EVENTS.BLOCK_ACTION)
  async handleBlockAction({ event }: BlockActionReceivedEvent): Promise<void> {
    this.logger.debug(`Action ${event.actionId} from ${event.userId}`);

    try {
      await this.dailyService.handleAction(event);
    } catch (error) {
      this.logError('block action', error);
    }
  }

  @OnEvent(MSG_EVENTS.VIEW_SUBMITTED)
  async handleViewSubmitted({ event }: ViewSubmittedEvent): Promise<void> {
    this.logger.debug(`View ${event.callbackId} submitted by ${event.userId}`);

    try {
      await this.dailyService.handleViewSubmission(event);
    } catch (error) {
      this.logError('view submission', error);
    }
  }

  private logError(source: string, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`Error handling ${source}: ${message}`);
  }
}
