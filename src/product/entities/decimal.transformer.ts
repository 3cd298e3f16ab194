import { ValueTransformer } from 'typeorm';

/** pg returns DECIMAL columns as strings. */
export const decimalTransformer: ValueTransformer = {
    to: (value: number | null | undefined) => value,
    from: (value: string | number | null) =>
        value === null ? null : parseFloat(value.toString()),
};
