/**
 * Core module - sequence aggregate, validation and the expansion engine
 * Nothing here performs IO; warnings go through the injected logger.
 */

// Aggregate
export type { SequenceInit, SequenceFields, SequenceOptions, AxisValues, AxisSizes } from './mda-sequence';
export { MDASequence } from './mda-sequence';

// Events
export type { MDAEventFields } from './mda-event';
export { MDAEvent } from './mda-event';

// Expansion
export { iterSequence, product } from './iter-sequence';

// Validation
export { parseAxisOrder, validateSequence } from './validate-sequence';

// Literal builder
export {
  createSequence,
  buildSequence,
  buildTimePlan,
  buildZPlan,
  buildGridPlan,
  buildAutofocusPlan,
} from './build-sequence';
