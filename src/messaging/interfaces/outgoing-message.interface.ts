/**
 * Result returned after delivering a payload to the chat platform.
 */
export interface SentMessageResult {
  /** Platform id of the posted message or view */
  messageId: string;
  /** Delivery timestamp */
  timestamp: number;
  /** Whether the platform accepted the payload */
  success: boolean;
}
