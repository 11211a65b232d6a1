import { ValueTransformer } from 'typeorm';

/** Postgres returns NUMERIC columns as strings; entities expose them as numbers. */
export const decimalTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null): number | null => {
    if (value === null) return null;
    return typeof value === 'number' ? value : Number.parseFloat(value);
  },
};
