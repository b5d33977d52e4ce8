/**
 * Typed exceptions for the ticket pipeline.
 *
 * Intake-time exceptions extend Nest HTTP exceptions and are final for the
 * caller. Processing-time errors extend `DomainException`; they never reach
 * an HTTP caller and only cause the queue to redeliver.
 */

import { BadRequestException, ServiceUnavailableException, UnprocessableEntityException } from '@nestjs/common';

export interface FieldError {
  field: string;
  reason: string;
}

// ==================== Base Domain Exceptions ====================

export abstract class DomainException extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
    };
  }
}

// ==================== Intake Exceptions ====================

/** The payload could not be read as a ticket request at all. */
export class MalformedRequestException extends BadRequestException {
  constructor(message = 'Request body is not a valid ticket payload', details: string[] = []) {
    super({
      error: 'BAD_REQUEST',
      message,
      ...(details.length > 0 ? { details } : {}),
    });
  }
}

/** One or more business rules rejected the request; nothing was enqueued. */
export class TicketValidationException extends UnprocessableEntityException {
  readonly errors: FieldError[];

  constructor(errors: FieldError[]) {
    super({
      error: 'VALIDATION_FAILED',
      message: 'Ticket request failed validation',
      errors,
    });
    this.errors = errors;
  }
}

/** The queue did not acknowledge the draft, so the ticket was not accepted. */
export class QueueUnavailableException extends ServiceUnavailableException {
  constructor() {
    super({
      error: 'QUEUE_UNAVAILABLE',
      message: 'Ticket could not be queued, please retry',
    });
  }
}

// ==================== Processing Exceptions ====================

export class NotificationDeliveryError extends DomainException {
  readonly code = 'notification.delivery_failed';

  constructor(ticketId: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Notification for ticket ${ticketId} was not delivered${detail}`, { cause });
  }
}
