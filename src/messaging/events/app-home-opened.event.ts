import { IncomingAppHomeOpened } from '../interfaces';

/**
 * Event emitted when a user opens the home tab.
 */
export class AppHomeOpenedEvent {
  constructor(public readonly event: IncomingAppHomeOpened) {}
}
