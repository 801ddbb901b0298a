/**
 * Tollgate CLI — Home Directory
 */

import { FileStateIO, resolveTollgateHome } from '@tollgate/runtime-host';

/** StateIO over the resolved home: --home, then TOLLGATE_HOME, then ~/.tollgate. */
export function openHome(home?: string): FileStateIO {
  return new FileStateIO(resolveTollgateHome({ tollgateHome: home }));
}
