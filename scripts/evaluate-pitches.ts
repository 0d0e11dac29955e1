/**
 * Compute send-readiness from a reviewed pitch_summary.csv.
 *
 * Run: npm run evaluate -- --pitch-summary outputs/pitch_summary.csv
 */
import { readFile } from 'fs/promises';
import { parseArgs } from 'util';
import { evaluateSendReadiness, formatReadiness } from '@pitchline/cli';

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: { 'pitch-summary': { type: 'string' } },
  });
  const summaryPath = values['pitch-summary'];
  if (!summaryPath) {
    console.error('Usage: evaluate-pitches --pitch-summary <csv>');
    process.exit(1);
  }

  const report = evaluateSendReadiness(await readFile(summaryPath, 'utf-8'));
  console.log(formatReadiness(report));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
