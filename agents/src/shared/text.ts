/**
 * Small text helpers shared by research and drafting.
 */

import { MAX_SUBJECT_LENGTH } from '@pitchline/schemas';

export function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/** "a", "a and b", "a, b and c" */
export function joinList(items: string[]): string {
  if (items.length <= 1) return items.join('');
  return `${items.slice(0, -1).join(', ')} and ${items[items.length - 1]}`;
}

export function firstName(name: string): string {
  return name.trim().split(/\s+/)[0] || 'there';
}

/** Trim a subject to the allowed length, cutting at a word boundary when possible. */
export function clampSubject(subject: string, max = MAX_SUBJECT_LENGTH): string {
  const clean = subject.replace(/\s+/g, ' ').trim();
  if (clean.length <= max) return clean;
  const cut = clean.slice(0, max - 1);
  const space = cut.lastIndexOf(' ');
  return `${(space > max / 2 ? cut.slice(0, space) : cut).trimEnd()}…`;
}
