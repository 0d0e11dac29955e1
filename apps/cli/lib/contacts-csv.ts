/**
 * Load journalist contacts from a CSV file.
 *
 * Columns (header names, case-insensitive): name, publication | outlet,
 * keywords (";"-separated), profile_url, email, id. Rows without a name are
 * skipped; malformed optional values are dropped with a warning.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { PipelineConfigError } from '@pitchline/core';
import { httpUrlSchema, rawContactSchema, type RawContact } from '@pitchline/schemas';
import { csvRecords } from './csv';

export interface ContactLoadWarning {
  row: number;
  message: string;
}

export interface LoadedContacts {
  contacts: RawContact[];
  warnings: ContactLoadWarning[];
}

export interface ContactLoadOptions {
  /** Keep at most this many contacts; 0 or undefined keeps all. */
  limit?: number;
}

const emailSchema = z.string().email();

function pick(record: Record<string, string>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key]?.trim();
    if (value) return value;
  }
  return undefined;
}

export function splitKeywords(value: string | undefined): string[] {
  return (value ?? '')
    .split(';')
    .map((k) => k.trim())
    .filter(Boolean);
}

export function parseContacts(content: string, options: ContactLoadOptions = {}): LoadedContacts {
  const contacts: RawContact[] = [];
  const warnings: ContactLoadWarning[] = [];
  const records = csvRecords(content);

  records.forEach((record, index) => {
    // header is row 1
    const row = index + 2;
    const name = pick(record, 'name', 'prospect_name');
    if (!name) {
      warnings.push({ row, message: 'missing name, row skipped' });
      return;
    }

    let profileUrl = pick(record, 'profile_url', 'profileurl', 'url');
    if (profileUrl && !httpUrlSchema.safeParse(profileUrl).success) {
      warnings.push({ row, message: `ignoring invalid profile_url "${profileUrl}"` });
      profileUrl = undefined;
    }
    let email = pick(record, 'email');
    if (email && !emailSchema.safeParse(email).success) {
      warnings.push({ row, message: `ignoring invalid email "${email}"` });
      email = undefined;
    }

    const parsed = rawContactSchema.safeParse({
      id: pick(record, 'id'),
      name,
      outlet: pick(record, 'publication', 'outlet'),
      profileUrl,
      email,
      keywords: splitKeywords(pick(record, 'keywords', 'beat')),
    });
    if (!parsed.success) {
      warnings.push({ row, message: `row skipped: ${parsed.error.issues[0]?.message ?? 'invalid'}` });
      return;
    }
    contacts.push(parsed.data);
  });

  const limit = options.limit ?? 0;
  return { contacts: limit > 0 ? contacts.slice(0, limit) : contacts, warnings };
}

export async function loadContacts(
  filePath: string,
  options: ContactLoadOptions = {},
): Promise<LoadedContacts> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new PipelineConfigError(`Cannot read contacts file ${filePath}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }
  return parseContacts(content, options);
}
