/**
 * Injection token for the messaging service.
 * Use this to inject the messaging service abstraction.
 *
 * @example
 * constructor(@Inject(MESSAGING_SERVICE) private readonly messaging: IMessagingService) {}
 */
export const MESSAGING_SERVICE = Symbol('MESSAGING_SERVICE');

/**
 * EventEmitter2 event names for incoming chat platform traffic.
 * All modules should use these constants instead of string literals.
 */
export const MSG_EVENTS = {
  COMMAND_RECEIVED: 'chat.command.received',
  APP_HOME_OPENED: 'chat.app_home.opened',
  BLOCK_ACTION: 'chat.block.action',
  VIEW_SUBMITTED: 'chat.view.submitted',
} as const;
