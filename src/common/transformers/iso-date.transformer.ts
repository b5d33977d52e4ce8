/**
 * IsoDateTransformer
 *
 * TypeORM value transformer for `timestamptz` columns whose domain value is
 * an ISO-8601 string. Postgres hands back `Date` objects; the pipeline keeps
 * timestamps as strings so a stored ticket reads back with identical values.
 *
 * @see https://typeorm.io/entities#column-options - transformer option
 */
import { ValueTransformer } from 'typeorm';

export const IsoDateTransformer: ValueTransformer = {
  to(value: string | null | undefined): Date | null | undefined {
    if (value === null || value === undefined) {
      return value;
    }

    const date = new Date(value);
    if (Number.isNaN(date.getTime())) {
      throw new Error(`Invalid timestamp value: ${value}. Expected an ISO-8601 string.`);
    }
    return date;
  },

  from(value: Date | string | null | undefined): string | null {
    if (value === null || value === undefined) {
      return null;
    }
    return (value instanceof Date ? value : new Date(value)).toISOString();
  },
};
