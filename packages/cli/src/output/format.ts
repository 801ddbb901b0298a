/**
 * Tollgate CLI — Line Formatting
 *
 * Pure formatters shared by the demo and log commands. Every function
 * returns plain text; color is applied by the caller through the theme.
 */

import type { EventLogEntry, JsonValue } from '@tollgate/runtime-host';
import type { DecisionEntry } from '@tollgate/kernel';
import type { DemoStep } from '../demo/scenario.js';

/** Shorten a 0x-prefixed hex value to `0x1234…abcd`. */
export function shortHex(value: string): string {
  return value.length > 14 ? `${value.slice(0, 6)}…${value.slice(-4)}` : value;
}

function formatJson(value: JsonValue): string {
  if (typeof value === 'string') return value.startsWith('0x') ? shortHex(value) : value;
  if (typeof value === 'object' && value !== null) return `[${value.map(formatJson).join(', ')}]`;
  return String(value);
}

export function formatEvent(entry: EventLogEntry): string {
  const fields = Object.entries(entry.fields)
    .map(([key, value]) => `${key}=${formatJson(value)}`)
    .join(' ');
  return `${shortHex(entry.address)}  ${entry.name}${fields === '' ? '' : '  ' + fields}`;
}

export function formatDecision(entry: DecisionEntry): string {
  const parts = [
    entry.decision.padEnd(6),
    `selector=${entry.selector}`,
    `integration=${shortHex(entry.integration)}`,
    `caller=${shortHex(entry.caller)}`,
  ];
  if (entry.module_id !== null) parts.push(`module=${shortHex(entry.module_id)}`);
  if (entry.reason !== null) parts.push(`reason=${entry.reason}`);
  return parts.join('  ');
}

export function formatStep(step: DemoStep, index: number): string {
  return `${String(index + 1).padStart(2)}. ${step.title}: ${step.outcome} (${step.detail})`;
}
