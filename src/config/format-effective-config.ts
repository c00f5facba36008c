/**
 * Format effective config for human-readable display (--verbose)
 */

import { EffectiveConfig } from '../types/effective-config';

export function formatEffectiveConfigForDisplay(config: EffectiveConfig): string {
  const source = (key: string): string => {
    const value = config.sources?.[key];
    return value ? ` (${value})` : '';
  };
  const lines: string[] = [];

  lines.push('┌─ Effective Configuration ───────────────────────────────────┐');
  lines.push(`│ Input:        ${config.input}`);
  lines.push(`│ Directory:    ${config.workingDirectory}`);
  lines.push(`│ Format:       ${config.output.format}${source('format')}`);
  lines.push(`│ FOV:          ${config.fov.width}x${config.fov.height}${source('fov')}`);
  if (config.axisOrder !== undefined) {
    lines.push(`│ Axis order:   ${config.axisOrder}${source('axisOrder')}`);
  }
  if (config.output.limit !== undefined) {
    lines.push(`│ Limit:        ${config.output.limit}${source('limit')}`);
  }
  lines.push(`│ Interactive:  ${config.interactivity.interactive ? 'yes' : 'no'}${source('interactive')}`);
  lines.push('└──────────────────────────────────────────────────────────────┘');

  return lines.join('\n');
}
