/**
 * Text renderings of a sequence and its events
 */

import { Axis } from '../types/axis';
import { MDAEvent } from '../core/mda-event';
import { MDASequence } from '../core/mda-sequence';

const TABLE_HEADER = ['#', 'index', 'time', 'pos', 'x', 'y', 'z', 'channel', 'exposure', 'autofocus'];

/**
 * Numbers are shown with at most three decimals; absent values as `-`
 */
export function formatNumber(value: number | undefined): string {
  if (value === undefined) {
    return '-';
  }
  return Number.isInteger(value) ? String(value) : String(Number(value.toFixed(3)));
}

/**
 * Axis indices in the order they are nested, e.g. `t0 c1 z2`
 */
export function formatIndex(event: MDAEvent, axes: readonly Axis[]): string {
  const parts: string[] = [];
  for (const axis of axes) {
    const value = event.index[axis];
    if (value !== undefined) {
      parts.push(`${axis}${value}`);
    }
  }
  return parts.join(' ') || '-';
}

function formatAutofocus(event: MDAEvent): string {
  if (!event.autofocus) {
    return '-';
  }
  return `${event.autofocus.autofocusDeviceName}@${formatNumber(event.autofocus.zStagePosition)}`;
}

export function eventRow(event: MDAEvent, axes: readonly Axis[]): string[] {
  return [
    String(event.globalIndex),
    formatIndex(event, axes),
    formatNumber(event.minStartTime),
    event.posName ?? '-',
    formatNumber(event.xPos),
    formatNumber(event.yPos),
    formatNumber(event.zPos),
    event.channel ? event.channel.config : '-',
    formatNumber(event.exposure),
    formatAutofocus(event),
  ];
}

/**
 * Pad every column to its widest cell; cells are separated by two spaces
 */
export function formatTable(rows: readonly (readonly string[])[]): string[] {
  const all = [TABLE_HEADER, ...rows];
  const widths = TABLE_HEADER.map((_, col) => Math.max(...all.map((row) => (row[col] ?? '').length)));
  return all.map((row) =>
    row
      .map((cell, col) => cell.padEnd(widths[col]))
      .join('  ')
      .trimEnd()
  );
}

/**
 * One JSON object per event; undefined fields are left out
 */
export function formatEventJson(event: MDAEvent): string {
  return JSON.stringify(event.toJSON());
}

export function formatSummary(sequence: MDASequence, count: number): string[] {
  const lines = [sequence.toString(), `Axis order: ${sequence.axisOrder}`];
  const axes = sequence.describeAxes();
  if (axes.length > 0) {
    lines.push('Axes:', ...axes.map((line) => `  ${line}`));
  }
  lines.push(`Shape: [${sequence.shape.join(', ')}]`);
  for (const warning of sequence.warnings) {
    lines.push(`Warning (${warning.rule}): ${warning.message}`);
  }
  lines.push(`Total events: ${count}`);
  return lines;
}
