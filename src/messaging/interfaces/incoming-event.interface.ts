/**
 * Slash command invocation, e.g. `/dailybot daily`.
 */
export interface IncomingCommand {
  /** Sub-command word (e.g., "daily") */
  command: string;
  /** Remaining text after the sub-command */
  text: string;
  userId: string;
  userName: string;
  teamId: string;
  teamDomain: string;
  channelId: string;
  /** Short-lived id that allows opening a modal in response */
  triggerId: string;
}

/**
 * A user opened the bot's home tab.
 */
export interface IncomingAppHomeOpened {
  userId: string;
}

/**
 * A user interacted with an element of a published view or message.
 * `payload` is the platform's raw interaction body.
 */
export interface IncomingBlockAction {
  userId: string;
  actionId: string;
  blockId: string;
  triggerId?: string;
  payload: unknown;
}

/**
 * A user submitted a modal.
 */
export interface IncomingViewSubmission {
  userId: string;
  callbackId: string;
  payload: unknown;
}
