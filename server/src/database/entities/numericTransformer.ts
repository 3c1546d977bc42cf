import type { ValueTransformer } from 'typeorm';

/** Postgres returns `numeric` columns as strings. */
export const numericTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) => (value === null ? 0 : Number(value)),
};
