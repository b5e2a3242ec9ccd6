import { Injectable, Logger } from '@nestjs/common';

import { HomeView, ModalView, SerializedNode } from '../../block-kit';
import { IMessagingService, SentMessageResult } from '../interfaces';

export type OutboxEntry =
  | { kind: 'modal'; triggerId: string; view: ModalView; timestamp: number }
  | { kind: 'home'; userId: string; view: HomeView; timestamp: number }
  | { kind: 'message'; channel: string; blocks: SerializedNode[]; text: string; timestamp: number };

/**
 * Messaging service that records every outgoing payload instead of delivering it.
 * Used until a platform transport is plugged in, and by tests for assertions.
 */
@Injectable()
export class OutboxMessagingService implements IMessagingService {
  private readonly logger = new Logger(OutboxMessagingService.name);

  /** Recorded payloads, oldest first */
  public entries: OutboxEntry[] = [];

  private sequence = 0;

  async openModal(triggerId: string, view: ModalView): Promise<SentMessageResult> {
    return this.record({ kind: 'modal', triggerId, view, timestamp: Date.now() });
  }

  async publishHomeView(userId: string, view: HomeView): Promise<SentMessageResult> {
    return this.record({ kind: 'home', userId, view, timestamp: Date.now() });
  }

  async postMessage(
    channel: string,
    blocks: SerializedNode[],
    text: string,
  ): Promise<SentMessageResult> {
    return this.record({ kind: 'message', channel, blocks, text, timestamp: Date.now() });
  }

  // ── Inspection ────────────────────────────────────────

  private record(entry: OutboxEntry): SentMessageResult {
    this.entries.push(entry);
    this.sequence++;
    this.logger.debug(`[OUTBOX] ${entry.kind}: ${JSON.stringify(entry).slice(0, 100)}`);
    return { messageId: `outbox-${this.sequence}`, timestamp: entry.timestamp, success: true };
  }

  /** Messages posted to a channel */
  getMessagesTo(channel: string): Extract<OutboxEntry, { kind: 'message' }>[] {
    return this.entries.filter(
      (e): e is Extract<OutboxEntry, { kind: 'message' }> =>
        e.kind === 'message' && e.channel === channel,
    );
  }

  getLastEntry(): OutboxEntry | null {
    return this.entries[this.entries.length - 1] ?? null;
  }

  reset(): void {
    this.entries = [];
    this.sequence = 0;
  }
}
