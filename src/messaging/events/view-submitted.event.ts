import { IncomingViewSubmission } from '../interfaces';

/**
 * Event emitted when a modal is submitted.
 */
export class ViewSubmittedEvent {
  constructor(public readonly event: IncomingViewSubmission) {}
}
