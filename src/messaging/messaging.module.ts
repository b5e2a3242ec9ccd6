import { Module } from '@nestjs/common';

import { MESSAGING_SERVICE } from './messaging.constants';
import { OutboxMessagingService } from './outbox/outbox-messaging.service';

/**
 * Messaging Module
 *
 * Gateway between the application and the chat platform.
 * Provides a provider-agnostic interface for publishing views and messages.
 */
@Module({
  imports: [],
  providers: [
    OutboxMessagingService,

    // The abstraction token → outbox implementation
    {
      provide: MESSAGING_SERVICE,
      useExisting: OutboxMessagingService,
    },
  ],
  exports: [MESSAGING_SERVICE, OutboxMessagingService],
})
export class MessagingModule {}
