/**
 * Tollgate Runtime Host — TOLLGATE_HOME Resolution
 *
 * Precedence, highest first:
 *
 *   1. Explicit `tollgateHome` option (the CLI's --home flag)
 *   2. TOLLGATE_HOME environment variable
 *   3. ~/.tollgate
 *
 * Layout under the resolved home:
 *
 *   <TOLLGATE_HOME>/
 *     state/    JSON state (registrar key, deployment records)
 *     logs/     events.jsonl, decisions.jsonl
 */

import { existsSync, mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

export interface ResolveTollgateHomeOptions {
  readonly tollgateHome?: string | undefined;
  /** Environment to consult. Defaults to process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Resolve the Tollgate home directory and create it if missing.
 *
 * @returns Absolute or caller-relative path of the home directory
 */
export function resolveTollgateHome(opts: ResolveTollgateHomeOptions = {}): string {
  const env = opts.env ?? process.env;
  const fromEnv = env['TOLLGATE_HOME'];

  let home: string;
  if (typeof opts.tollgateHome === 'string' && opts.tollgateHome !== '') {
    home = opts.tollgateHome;
  } else if (typeof fromEnv === 'string' && fromEnv !== '') {
    home = fromEnv;
  } else {
    home = join(homedir(), '.tollgate');
  }

  if (!existsSync(home)) {
    mkdirSync(home, { recursive: true });
  }
  return home;
}
