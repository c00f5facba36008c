export { parseArgs } from './arg-parser';
export { getUsageText, printUsage } from './help';
export type { ParsedArgs, ParseResult } from './types';
export { DEFAULT_ARGS } from './types';
