/**
 * Tollgate Runtime Host — JSONL Log Reader
 *
 * Reads `events.jsonl` or `decisions.jsonl` content as written by the file
 * sinks. Pure: callers fetch the text with StateIO.readLogRaw().
 *
 *   - malformed lines and lines without a string `event_id` are dropped and counted
 *   - a repeated `event_id` keeps the first occurrence
 *   - content not ending in '\n' has its last line treated as a torn write
 *   - output is ordered by (timestamp, event_id)
 */

export interface LogLine {
  readonly event_id: string;
  readonly timestamp?: string;
  readonly [key: string]: unknown;
}

export interface LogReadStats {
  readonly totalLines: number;
  readonly parsedEntries: number;
  readonly duplicates: number;
  readonly parseErrors: number;
  readonly partialTrailingLine: boolean;
}

export interface LogReadResult {
  readonly entries: ReadonlyArray<LogLine>;
  readonly stats: LogReadStats;
}

export function readLog(rawContent: string): LogReadResult {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lines = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter((l) => l.length > 0);

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Set<string>();
  const entries: LogLine[] = [];

  for (const line of lines) {
    const parsed = parseLine(line);
    if (parsed === null) {
      parseErrors++;
      continue;
    }
    if (seen.has(parsed.event_id)) {
      duplicates++;
      continue;
    }
    seen.add(parsed.event_id);
    entries.push(parsed);
  }

  entries.sort((a, b) => {
    const ta = a.timestamp ?? '';
    const tb = b.timestamp ?? '';
    if (ta !== tb) return ta < tb ? -1 : 1;
    if (a.event_id === b.event_id) return 0;
    return a.event_id < b.event_id ? -1 : 1;
  });

  return {
    entries,
    stats: {
      totalLines: lines.length,
      parsedEntries: entries.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
    },
  };
}

function parseLine(line: string): LogLine | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err: unknown) {
    if (err instanceof SyntaxError) return null;
    throw err;
  }
  if (!isLogLine(parsed)) return null;
  return parsed;
}

function isLogLine(value: unknown): value is LogLine {
  if (typeof value !== 'object' || value === null || !('event_id' in value)) return false;
  if (typeof value.event_id !== 'string') return false;
  return !('timestamp' in value) || typeof value.timestamp === 'string';
}
