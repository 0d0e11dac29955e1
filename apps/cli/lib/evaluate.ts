/**
 * Send-readiness from a reviewed pitch_summary.csv: rows labelled "1" over
 * all labelled rows. Unlabelled rows are ignored.
 */

import { csvRecords } from './csv';

export interface ReadinessReport {
  rows: number;
  labelled: number;
  ready: number;
  /** null when nothing is labelled yet. */
  ratio: number | null;
}

export function evaluateSendReadiness(content: string): ReadinessReport {
  const records = csvRecords(content);
  let labelled = 0;
  let ready = 0;
  for (const record of records) {
    const label = record['manual_label']?.trim();
    if (label !== '0' && label !== '1') continue;
    labelled++;
    if (label === '1') ready++;
  }
  return {
    rows: records.length,
    labelled,
    ready,
    ratio: labelled === 0 ? null : ready / labelled,
  };
}

export function formatReadiness(report: ReadinessReport): string {
  if (report.ratio === null) {
    return "No manual labels found. Fill in the 'manual_label' column (1 = send-ready, 0 = needs work).";
  }
  return `Send-ready pitches: ${report.ready}/${report.labelled} (${(report.ratio * 100).toFixed(2)}%)`;
}
