import { createTicketDraft, createTicketRequest, INTAKE_AT } from '../../../../test/helpers/mock-factories';
import {
  collectIssues,
  evaluateEligibility,
  parsePurchaseDate,
  validateTicketRequest,
  warrantyEndsAt,
} from './ticket.validator';

describe('ticket validator', () => {
  const newTicketId = jest.fn(() => 'generated-id');
  const options = { now: INTAKE_AT, newTicketId };

  beforeEach(() => {
    newTicketId.mockClear();
  });

  describe('validateTicketRequest', () => {
    it('should accept an eligible request and stamp id and intake time', () => {
      const request = createTicketRequest();

      const result = validateTicketRequest(request, options);

      expect(result).toEqual({
        valid: true,
        draft: {
          ...request,
          nationalId: '52998224725',
          ticketId: 'generated-id',
          openedAt: '2024-01-15T12:00:00.000Z',
        },
      });
      expect(newTicketId).toHaveBeenCalledTimes(1);
    });

    it('should store the CPF as bare digits so it fits the national_id column', () => {
      const result = validateTicketRequest(createTicketRequest({ nationalId: '  529.982.247-25 ' }), options);

      if (!result.valid) {
        throw new Error('expected a valid result');
      }
      expect(result.draft.nationalId).toBe('52998224725');
    });

    it('should reject a CPF with punctuation outside the usual positions', () => {
      const result = validateTicketRequest(createTicketRequest({ nationalId: '5.2.9.9.8.2.2.4.7.2.5' }), options);

      expect(result).toEqual({ valid: false, errors: [{ field: 'cpf', reason: 'INVALID_FORMAT:cpf' }] });
    });

    it('should return a frozen draft', () => {
      const result = validateTicketRequest(createTicketRequest(), options);

      if (!result.valid) {
        throw new Error('expected a valid result');
      }
      expect(Object.isFrozen(result.draft)).toBe(true);
      expect(Object.isFrozen(result.draft.device)).toBe(true);
    });

    it('should reject a purchase more than 12 months before intake', () => {
      const result = validateTicketRequest(createTicketRequest({ device: { purchaseDate: '2022-01-01' } }), options);

      expect(result).toEqual({
        valid: false,
        errors: [{ field: 'aparelho.data_compra', reason: 'EXPIRED_WARRANTY' }],
      });
      expect(newTicketId).not.toHaveBeenCalled();
    });

    it('should reject a 4-character serial number', () => {
      const result = validateTicketRequest(createTicketRequest({ device: { serialNumber: 'AB12' } }), options);

      expect(result).toEqual({
        valid: false,
        errors: [{ field: 'aparelho.numero_serie', reason: 'INVALID_SERIAL' }],
      });
    });

    it('should accept a serial number of exactly 5 characters', () => {
      const result = validateTicketRequest(createTicketRequest({ device: { serialNumber: 'AB123' } }), options);
      expect(result.valid).toBe(true);
    });

    it('should not count surrounding whitespace towards the serial length', () => {
      const result = validateTicketRequest(createTicketRequest({ device: { serialNumber: '  AB12  ' } }), options);
      expect(result.valid).toBe(false);
    });

    it('should reject a missing invoice', () => {
      const result = validateTicketRequest(createTicketRequest({ device: { invoiceNumber: '   ' } }), options);

      expect(result).toEqual({
        valid: false,
        errors: [{ field: 'aparelho.nota_fiscal', reason: 'MISSING_INVOICE' }],
      });
    });

    it('should aggregate every violation in a fixed order', () => {
      const request = createTicketRequest({
        fullName: '',
        nationalId: '123.456.789-00',
        email: 'maria.example.com',
        address: { postalCode: '' },
        device: { invoiceNumber: '', serialNumber: 'AB12', purchaseDate: '2022-01-01' },
      });

      const result = validateTicketRequest(request, options);

      expect(result).toEqual({
        valid: false,
        errors: [
          { field: 'nome_completo', reason: 'MISSING_FIELD:nome_completo' },
          { field: 'endereco.cep', reason: 'MISSING_FIELD:endereco.cep' },
          { field: 'cpf', reason: 'INVALID_FORMAT:cpf' },
          { field: 'email', reason: 'INVALID_FORMAT:email' },
          { field: 'aparelho.nota_fiscal', reason: 'MISSING_INVOICE' },
          { field: 'aparelho.numero_serie', reason: 'INVALID_SERIAL' },
          { field: 'aparelho.data_compra', reason: 'EXPIRED_WARRANTY' },
        ],
      });
    });

    it('should not require the address complement or notes', () => {
      const result = validateTicketRequest(
        createTicketRequest({ notes: '', address: { complement: '' } }),
        options,
      );
      expect(result.valid).toBe(true);
    });

    it('should report a missing purchase date once', () => {
      const result = validateTicketRequest(createTicketRequest({ device: { purchaseDate: '' } }), options);

      expect(result).toEqual({
        valid: false,
        errors: [{ field: 'aparelho.data_compra', reason: 'MISSING_FIELD:aparelho.data_compra' }],
      });
    });
  });

  describe('warranty window', () => {
    it('should reject at exactly 12 months', () => {
      const issues = collectIssues(
        createTicketRequest({ device: { purchaseDate: '2023-01-15' } }),
        new Date('2024-01-15T00:00:00.000Z'),
      );
      expect(issues).toEqual([{ field: 'aparelho.data_compra', reason: 'EXPIRED_WARRANTY' }]);
    });

    it('should accept the last instant before 12 months', () => {
      const issues = collectIssues(
        createTicketRequest({ device: { purchaseDate: '2023-01-15' } }),
        new Date('2024-01-14T23:59:59.999Z'),
      );
      expect(issues).toEqual([]);
    });

    it('should accept a purchase made on the intake day', () => {
      const issues = collectIssues(createTicketRequest({ device: { purchaseDate: '2024-01-15' } }), INTAKE_AT);
      expect(issues).toEqual([]);
    });

    it('should reject a purchase date in the future', () => {
      const issues = collectIssues(createTicketRequest({ device: { purchaseDate: '2024-02-01' } }), INTAKE_AT);
      expect(issues).toEqual([{ field: 'aparelho.data_compra', reason: 'INVALID_DATE:aparelho.data_compra' }]);
    });

    it('should reject an unparsable purchase date', () => {
      const issues = collectIssues(createTicketRequest({ device: { purchaseDate: '20/11/2023' } }), INTAKE_AT);
      expect(issues).toEqual([{ field: 'aparelho.data_compra', reason: 'INVALID_DATE:aparelho.data_compra' }]);
    });

    it('should reject a timestamp on a day that does not exist', () => {
      const issues = collectIssues(
        createTicketRequest({ device: { purchaseDate: '2023-02-30T10:00:00Z' } }),
        INTAKE_AT,
      );
      expect(issues).toEqual([{ field: 'aparelho.data_compra', reason: 'INVALID_DATE:aparelho.data_compra' }]);
    });

    it('should add 12 calendar months', () => {
      expect(warrantyEndsAt(new Date('2023-11-20T00:00:00.000Z')).toISOString()).toBe('2024-11-20T00:00:00.000Z');
    });

    it('should end a leap-day warranty on the last day of February', () => {
      expect(warrantyEndsAt(new Date('2024-02-29T10:30:00.000Z')).toISOString()).toBe('2025-02-28T10:30:00.000Z');
    });

    it('should reject a leap-day purchase from 28 February of the next year', () => {
      const issues = collectIssues(
        createTicketRequest({ device: { purchaseDate: '2024-02-29' } }),
        new Date('2025-02-28T00:00:00.000Z'),
      );
      expect(issues).toEqual([{ field: 'aparelho.data_compra', reason: 'EXPIRED_WARRANTY' }]);
    });
  });

  describe('parsePurchaseDate', () => {
    it('should read calendar dates as midnight UTC', () => {
      expect(parsePurchaseDate('2023-11-20')?.toISOString()).toBe('2023-11-20T00:00:00.000Z');
    });

    it('should read timestamps without offset as UTC', () => {
      expect(parsePurchaseDate('2023-11-20T15:30:00')?.toISOString()).toBe('2023-11-20T15:30:00.000Z');
    });

    it('should honour explicit offsets', () => {
      expect(parsePurchaseDate('2023-11-20T15:30:00-03:00')?.toISOString()).toBe('2023-11-20T18:30:00.000Z');
    });

    it('should reject impossible calendar dates', () => {
      expect(parsePurchaseDate('2023-02-30')).toBeNull();
    });

    it.each(['2023-02-30T10:00:00Z', '2023-04-31T08:00:00', '2023-13-01T00:00:00-03:00'])(
      'should reject the impossible day in timestamp %s',
      (value) => {
        expect(parsePurchaseDate(value)).toBeNull();
      },
    );

    it('should accept a leap-day timestamp', () => {
      expect(parsePurchaseDate('2024-02-29T10:00:00Z')?.toISOString()).toBe('2024-02-29T10:00:00.000Z');
    });

    it('should reject free text', () => {
      expect(parsePurchaseDate('last week')).toBeNull();
    });
  });

  describe('evaluateEligibility', () => {
    it('should judge the warranty against the intake instant, not the current time', () => {
      // 2023-01-20 + 12 months is still ahead of the 2024-01-15 intake
      const draft = createTicketDraft({ device: { purchaseDate: '2023-01-20' } });
      expect(evaluateEligibility(draft)).toEqual([]);
    });

    it('should flag drafts whose rules no longer hold', () => {
      const draft = createTicketDraft({ device: { invoiceNumber: '' } });
      expect(evaluateEligibility(draft)).toEqual([{ field: 'aparelho.nota_fiscal', reason: 'MISSING_INVOICE' }]);
    });
  });
});
