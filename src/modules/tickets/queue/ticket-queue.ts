import { TicketDraft } from '../tickets.types';

/**
 * Producer side of the ticket queue. `enqueue` resolves only once the draft
 * is held by the queue, so intake may acknowledge the caller afterwards.
 */
export abstract class TicketQueue {
  abstract enqueue(draft: TicketDraft): Promise<void>;
}

/** One delivery of a draft to a consumer. */
export interface QueueDelivery {
  readonly draft: TicketDraft;
  /** 1 on first delivery, incremented on every redelivery */
  readonly deliveryCount: number;
  /** Removes the draft from the queue. Unacked drafts are redelivered. */
  ack(): void;
}
