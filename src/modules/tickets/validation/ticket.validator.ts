import { isEmail } from 'class-validator';
import { TicketDraft, TicketRequest, ValidationIssue, ValidationResult } from '../tickets.types';
import { isValidCpf, normalizeCpf } from './cpf';

export const WARRANTY_MONTHS = 12;
export const MIN_SERIAL_LENGTH = 5;

export const ValidationReason = {
  EXPIRED_WARRANTY: 'EXPIRED_WARRANTY',
  MISSING_INVOICE: 'MISSING_INVOICE',
  INVALID_SERIAL: 'INVALID_SERIAL',
  missingField: (field: string) => `MISSING_FIELD:${field}`,
  invalidFormat: (field: string) => `INVALID_FORMAT:${field}`,
  invalidDate: (field: string) => `INVALID_DATE:${field}`,
} as const;

type FieldReader = (request: TicketRequest) => string;

/** Required fields in wire order; the error list follows this order. */
const REQUIRED_FIELDS: ReadonlyArray<readonly [string, FieldReader]> = [
  ['nome_completo', (r) => r.fullName],
  ['cpf', (r) => r.nationalId],
  ['email', (r) => r.email],
  ['telefone', (r) => r.phone],
  ['endereco.rua', (r) => r.address.street],
  ['endereco.numero', (r) => r.address.number],
  ['endereco.bairro', (r) => r.address.district],
  ['endereco.cidade', (r) => r.address.city],
  ['endereco.estado', (r) => r.address.state],
  ['endereco.cep', (r) => r.address.postalCode],
  ['aparelho.marca', (r) => r.device.brand],
  ['aparelho.modelo', (r) => r.device.model],
  ['aparelho.data_compra', (r) => r.device.purchaseDate],
  ['aparelho.defeito_relatado', (r) => r.device.reportedDefect],
];

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})T\d{2}:\d{2}(:\d{2}(\.\d{1,9})?)?(Z|[+-]\d{2}:\d{2})?$/;
const HAS_OFFSET = /(Z|[+-]\d{2}:\d{2})$/;

function isBlank(value: string): boolean {
  return value.trim() === '';
}

/** Midnight UTC of the given day, or null when the day does not exist. */
function calendarDate(year: number, month: number, day: number): Date | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Parses a purchase date. Calendar dates are midnight UTC; timestamps
 * without an offset are read as UTC. Returns null for anything else,
 * including impossible dates such as 2023-02-30.
 */
export function parsePurchaseDate(value: string): Date | null {
  const trimmed = value.trim();

  const dateOnly = DATE_ONLY.exec(trimmed);
  if (dateOnly) {
    return calendarDate(Number(dateOnly[1]), Number(dateOnly[2]), Number(dateOnly[3]));
  }

  const timestamp = ISO_TIMESTAMP.exec(trimmed);
  if (!timestamp || !calendarDate(Number(timestamp[1]), Number(timestamp[2]), Number(timestamp[3]))) {
    return null;
  }
  const parsed = Date.parse(HAS_OFFSET.test(trimmed) ? trimmed : `${trimmed}Z`);
  return Number.isNaN(parsed) ? null : new Date(parsed);
}

/**
 * First instant that is no longer covered by the warranty. The day is
 * clamped to the end of the target month, so a purchase on 29 February is
 * covered until 28 February of the following year.
 */
export function warrantyEndsAt(purchaseDate: Date): Date {
  const targetMonth = purchaseDate.getUTCMonth() + WARRANTY_MONTHS;
  const lastDayOfTarget = new Date(Date.UTC(purchaseDate.getUTCFullYear(), targetMonth + 1, 0)).getUTCDate();
  return new Date(
    Date.UTC(
      purchaseDate.getUTCFullYear(),
      targetMonth,
      Math.min(purchaseDate.getUTCDate(), lastDayOfTarget),
      purchaseDate.getUTCHours(),
      purchaseDate.getUTCMinutes(),
      purchaseDate.getUTCSeconds(),
      purchaseDate.getUTCMilliseconds(),
    ),
  );
}

function checkPurchaseDate(request: TicketRequest, referenceDate: Date): ValidationIssue | null {
  const field = 'aparelho.data_compra';
  if (isBlank(request.device.purchaseDate)) {
    // already reported as a missing field
    return null;
  }

  const purchaseDate = parsePurchaseDate(request.device.purchaseDate);
  if (!purchaseDate || purchaseDate.getTime() > referenceDate.getTime()) {
    return { field, reason: ValidationReason.invalidDate(field) };
  }
  if (referenceDate.getTime() >= warrantyEndsAt(purchaseDate).getTime()) {
    return { field, reason: ValidationReason.EXPIRED_WARRANTY };
  }
  return null;
}

/**
 * Evaluates every business rule against `referenceDate` and returns all
 * violations, in a fixed order. An empty list means the request is eligible.
 */
export function collectIssues(request: TicketRequest, referenceDate: Date): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  for (const [field, read] of REQUIRED_FIELDS) {
    if (isBlank(read(request))) {
      issues.push({ field, reason: ValidationReason.missingField(field) });
    }
  }

  if (!isBlank(request.nationalId) && !isValidCpf(request.nationalId)) {
    issues.push({ field: 'cpf', reason: ValidationReason.invalidFormat('cpf') });
  }
  if (!isBlank(request.email) && !isEmail(request.email.trim())) {
    issues.push({ field: 'email', reason: ValidationReason.invalidFormat('email') });
  }

  if (isBlank(request.device.invoiceNumber)) {
    issues.push({ field: 'aparelho.nota_fiscal', reason: ValidationReason.MISSING_INVOICE });
  }

  if (request.device.serialNumber.trim().length < MIN_SERIAL_LENGTH) {
    issues.push({ field: 'aparelho.numero_serie', reason: ValidationReason.INVALID_SERIAL });
  }

  const dateIssue = checkPurchaseDate(request, referenceDate);
  if (dateIssue) {
    issues.push(dateIssue);
  }

  return issues;
}

export interface ValidateOptions {
  now: Date;
  newTicketId: () => string;
}

function createDraft(request: TicketRequest, ticketId: string, openedAt: string): TicketDraft {
  return Object.freeze({
    ...request,
    nationalId: normalizeCpf(request.nationalId) ?? request.nationalId,
    address: Object.freeze({ ...request.address }),
    device: Object.freeze({ ...request.device }),
    ticketId,
    openedAt,
  });
}

/**
 * Validates a request at intake. Pure: the clock and id generator are passed
 * in. All rule violations are aggregated. The draft carries the CPF as its
 * 11 bare digits.
 */
export function validateTicketRequest(request: TicketRequest, options: ValidateOptions): ValidationResult {
  const errors = collectIssues(request, options.now);
  if (errors.length > 0) {
    return { valid: false, errors };
  }
  return { valid: true, draft: createDraft(request, options.newTicketId(), options.now.toISOString()) };
}

/**
 * Re-checks a queued draft against its own intake instant, so time spent in
 * the queue never pushes a ticket out of its warranty window.
 */
export function evaluateEligibility(draft: TicketDraft): ValidationIssue[] {
  return collectIssues(draft, new Date(draft.openedAt));
}
