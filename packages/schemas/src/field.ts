import { z } from 'zod';

/**
 * A value that was either verified, or explicitly could not be.
 *
 * Records never omit a declared field: anything an agent could not confirm is
 * stored as `{ status: 'unknown' }`. Plain `undefined` is only used while a
 * record is still being built ("not computed yet").
 */
export function fieldSchema<T extends z.ZodTypeAny>(value: T) {
  return z.discriminatedUnion('status', [
    z.object({ status: z.literal('resolved'), value }),
    z.object({ status: z.literal('unknown') }),
  ]);
}

export type Field<T> = { status: 'resolved'; value: T } | { status: 'unknown' };

export const UNKNOWN = Object.freeze({ status: 'unknown' as const });

export function resolved<T>(value: T): Field<T> {
  return { status: 'resolved', value };
}

/** Finalize an optional value: blank strings and undefined become UNKNOWN. */
export function toField<T>(value: T | null | undefined): Field<T> {
  if (value === undefined || value === null) return UNKNOWN;
  if (typeof value === 'string' && value.trim() === '') return UNKNOWN;
  return resolved(value);
}

export function fieldValue<T>(field: Field<T>): T | undefined {
  return field.status === 'resolved' ? field.value : undefined;
}

export function displayField(field: Field<string>, placeholder = 'N/A'): string {
  return field.status === 'resolved' ? field.value : placeholder;
}
