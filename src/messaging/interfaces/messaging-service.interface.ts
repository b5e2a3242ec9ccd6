import { HomeView, ModalView, SerializedNode } from '../../block-kit';

import { SentMessageResult } from './outgoing-message.interface';

/**
 * Abstract chat platform client.
 * Consumers should depend on this interface, not concrete implementations.
 */
export interface IMessagingService {
  /** Open a modal in response to a command or action */
  openModal(triggerId: string, view: ModalView): Promise<SentMessageResult>;

  /** Replace the user's home tab */
  publishHomeView(userId: string, view: HomeView): Promise<SentMessageResult>;

  /**
   * Post blocks to a channel.
   * `text` is the notification fallback shown where blocks cannot render.
   */
  postMessage(channel: string, blocks: SerializedNode[], text: string): Promise<SentMessageResult>;
}
