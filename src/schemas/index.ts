/**
 * Literal schemas for sequences and their plans
 */

export type { TimePhaseData, TimePlanData } from './time-plan.schema';
export { durationSchema, timePhaseSchema, timePlanSchema } from './time-plan.schema';

export type { ZPlanData } from './z-plan.schema';
export { zPlanSchema } from './z-plan.schema';

export type { GridPlanData } from './grid-plan.schema';
export { gridPlanSchema } from './grid-plan.schema';

export type { AutofocusPlanData } from './autofocus-plan.schema';
export { autofocusPlanSchema } from './autofocus-plan.schema';

export type { ChannelData, PositionData, SequenceData } from './sequence.schema';
export { channelSchema, positionSchema, sequenceSchema } from './sequence.schema';

export type { ValidationResult } from './validators';
export { formatIssues, validateSequenceInput, parseSequenceJson } from './validators';
