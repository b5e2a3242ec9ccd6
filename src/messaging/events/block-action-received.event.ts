import { IncomingBlockAction } from '../interfaces';

/**
 * Event emitted when a user interacts with a block element.
 */
export class BlockActionReceivedEvent {
  constructor(public readonly event: IncomingBlockAction) {}
}
