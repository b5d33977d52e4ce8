/** BullMQ queue name for ticket drafts. */
export const TICKET_QUEUE = 'tickets';

/** Job name of a draft waiting to be processed. */
export const PROCESS_TICKET_JOB = 'process-ticket';

export interface RequesterAddress {
  street: string;
  number: string;
  /** Empty when the requester gave none */
  complement: string;
  district: string;
  city: string;
  state: string;
  postalCode: string;
}

export interface DeviceInfo {
  brand: string;
  model: string;
  serialNumber: string;
  /** `YYYY-MM-DD` or a full ISO-8601 timestamp */
  purchaseDate: string;
  invoiceNumber: string;
  reportedDefect: string;
}

export interface TicketRequest {
  fullName: string;
  nationalId: string;
  email: string;
  phone: string;
  address: RequesterAddress;
  device: DeviceInfo;
  notes: string;
}

/** A validated request in transit through the queue. */
export interface TicketDraft extends TicketRequest {
  readonly ticketId: string;
  /** Intake instant, ISO-8601 UTC */
  readonly openedAt: string;
}

export type TicketStatus = 'accepted' | 'rejected';

/** Terminal, persisted outcome of a draft. */
export interface Ticket extends TicketDraft {
  readonly status: TicketStatus;
  /** Reason code, only set when rejected */
  readonly rejectionReason: string | null;
  readonly processedAt: string;
}

export interface ValidationIssue {
  /** Wire path of the offending field, e.g. `aparelho.numero_serie` */
  field: string;
  reason: string;
}

export type ValidationResult = { valid: true; draft: TicketDraft } | { valid: false; errors: ValidationIssue[] };

export interface RequesterContact {
  name: string;
  email: string;
  phone: string;
}

export interface TicketOutcome {
  ticketId: string;
  status: TicketStatus;
  rejectionReason: string | null;
  device: Pick<DeviceInfo, 'brand' | 'model' | 'serialNumber'>;
  openedAt: string;
}

export function contactOf(ticket: TicketRequest): RequesterContact {
  return { name: ticket.fullName, email: ticket.email, phone: ticket.phone };
}

export function outcomeOf(ticket: Ticket): TicketOutcome {
  return {
    ticketId: ticket.ticketId,
    status: ticket.status,
    rejectionReason: ticket.rejectionReason,
    device: {
      brand: ticket.device.brand,
      model: ticket.device.model,
      serialNumber: ticket.device.serialNumber,
    },
    openedAt: ticket.openedAt,
  };
}
