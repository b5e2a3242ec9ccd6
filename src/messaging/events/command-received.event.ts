import { IncomingCommand } from '../interfaces';

/**
 * Event emitted when a slash command is invoked.
 */
export class CommandReceivedEvent {
  constructor(public readonly event: IncomingCommand) {}
}
