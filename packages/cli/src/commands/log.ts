/**
 * tollgate log — Query the event and decision logs
 *
 * Usage:
 *   tollgate log [events|decisions] [--name <event>] [--decision <d>] [--limit <n>] [--json]
 *
 * Reads <home>/logs/events.jsonl or decisions.jsonl. Malformed lines,
 * duplicates and a torn trailing line are skipped and reported.
 */

import { Command } from 'commander';
import { EVENTS_LOG, readLog } from '@tollgate/runtime-host';
import type { LogLine } from '@tollgate/runtime-host';
import { DECISIONS_LOG } from '@tollgate/kernel';
import { openHome } from '../home.js';
import { t } from '../output/theme.js';

export type LogKind = 'events' | 'decisions';

export interface LogFilter {
  /** Event name to keep (events log). */
  readonly name?: string | undefined;
  /** Decision to keep (decisions log). */
  readonly decision?: string | undefined;
  /** Keep only the newest `limit` entries. */
  readonly limit: number;
}

export function selectLogLines(entries: ReadonlyArray<LogLine>, filter: LogFilter): LogLine[] {
  const matching = entries.filter(
    (entry) =>
      (filter.name === undefined || entry['name'] === filter.name) &&
      (filter.decision === undefined || entry['decision'] === filter.decision),
  );
  return filter.limit > 0 ? matching.slice(-filter.limit) : matching;
}

function isLogKind(value: string): value is LogKind {
  return value === 'events' || value === 'decisions';
}

export const logCommand = new Command('log')
  .description('Query the event or decision log')
  .argument('[kind]', 'events or decisions', 'events')
  .option('--name <event>', 'Filter events by name')
  .option('--decision <decision>', 'Filter decisions (Permit|Deny|Bypass|Failed)')
  .option('--limit <n>', 'Maximum number of entries, newest last', '100')
  .option('--json', 'Output as JSON lines')
  .option('--home <dir>', 'Tollgate home directory')
  .action((kind: string, options: { name?: string; decision?: string; limit: string; json?: boolean; home?: string }) => {
    if (!isLogKind(kind)) {
      // eslint-disable-next-line no-console
      console.error(t.red(`Unknown log "${kind}". Expected events or decisions.`));
      process.exitCode = 1;
      return;
    }
    const limit = Number.parseInt(options.limit, 10);
    if (!Number.isInteger(limit) || limit < 0) {
      // eslint-disable-next-line no-console
      console.error(t.red(`Invalid --limit "${options.limit}"`));
      process.exitCode = 1;
      return;
    }

    const { entries, stats } = readLog(openHome(options.home).readLogRaw(kind === 'events' ? EVENTS_LOG : DECISIONS_LOG));
    const selected = selectLogLines(entries, { name: options.name, decision: options.decision, limit });

    for (const entry of selected) {
      // eslint-disable-next-line no-console
      console.log(options.json === true ? JSON.stringify(entry) : describeLine(kind, entry));
    }
    const skipped = stats.parseErrors + stats.duplicates + (stats.partialTrailingLine ? 1 : 0);
    if (skipped > 0) {
      // eslint-disable-next-line no-console
      console.error(t.amber(`${skipped} line(s) skipped`));
    }
  });

function describeLine(kind: LogKind, entry: LogLine): string {
  const time = t.muted(entry.timestamp ?? '');
  if (kind === 'events') {
    return `${time}  ${String(entry['name'])}  ${JSON.stringify(entry['fields'] ?? {})}`;
  }
  const reason = entry['reason'];
  return `${time}  ${String(entry['decision'])}  ${String(entry['selector'])}${typeof reason === 'string' ? '  ' + reason : ''}`;
}
