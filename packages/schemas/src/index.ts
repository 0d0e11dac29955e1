/**
 * @pitchline/schemas - validated records passed between pipeline stages
 */

export * from './enums';
export * from './field';
export * from './contact';
export * from './research';
export * from './pitch';
export * from './manifest';
export * from './brand-voice';
