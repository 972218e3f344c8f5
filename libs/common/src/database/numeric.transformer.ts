import { ValueTransformer } from 'typeorm';

// pg hands decimals back as strings, sqlite as numbers
export const numericTransformer: ValueTransformer = {
  to: (value?: number | null) => value,
  from: (value?: string | number | null) =>
    value === null || value === undefined ? value : Number(value),
};
