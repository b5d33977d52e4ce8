import { IsoDateTransformer } from './iso-date.transformer';

describe('IsoDateTransformer', () => {
  it('should convert ISO strings to dates on write', () => {
    expect(IsoDateTransformer.to('2024-01-15T10:30:00.000Z')).toEqual(new Date(Date.UTC(2024, 0, 15, 10, 30)));
  });

  it('should pass null and undefined through on write', () => {
    expect(IsoDateTransformer.to(null)).toBeNull();
    expect(IsoDateTransformer.to(undefined)).toBeUndefined();
  });

  it('should reject unparsable timestamps', () => {
    expect(() => IsoDateTransformer.to('yesterday')).toThrow('Invalid timestamp value: yesterday');
  });

  it('should read dates back as the same ISO string', () => {
    const iso = '2024-01-15T10:30:00.123Z';
    expect(IsoDateTransformer.from(IsoDateTransformer.to(iso))).toBe(iso);
  });

  it('should read null columns as null', () => {
    expect(IsoDateTransformer.from(null)).toBeNull();
  });
});
