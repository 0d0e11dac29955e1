/**
 * @pitchline/cli - configuration, contact loading and output writers
 */

export * from './config';
export * from './contacts-csv';
export * from './csv';
export * from './evaluate';
export * from './run-logs';
export * from './writers';
