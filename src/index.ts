/**
 * mda-sequence
 *
 * Describe a multi-dimensional microscope acquisition as a set of axis plans
 * and expand it into the ordered stream of events to acquire.
 *
 * @example
 * ```ts
 * import { createSequence } from 'mda-sequence';
 *
 * const sequence = createSequence({
 *   timePlan: { interval: 1, loops: 2 },
 *   channels: ['DAPI', 'FITC'],
 *   zPlan: { range: 4, step: 1 },
 * });
 * for (const event of sequence) {
 *   console.log(event.globalIndex, event.index, event.zPos);
 * }
 * ```
 */

export * from './types';
export * from './plans';
export * from './core';
export * from './schemas';
export * from './io';
export * from './config';
export * from './logging';
export * from './ui';

export { runExpand } from './commands/expand';
export type { ExpandDependencies } from './commands/expand';
export { runCli } from './main';
export type { CliEnvironment } from './main';
export { VERSION } from './version';
