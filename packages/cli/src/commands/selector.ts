/**
 * tollgate selector — Print function selectors
 *
 * Usage:
 *   tollgate selector 'safeMint(uint256,bytes)' 'setLimit(uint256,bytes)'
 */

import { Command } from 'commander';
import { parseSignature } from '@tollgate/runtime-host';
import { t } from '../output/theme.js';

export const selectorCommand = new Command('selector')
  .description('Print the 4-byte selector of one or more function signatures')
  .argument('<signature...>', "Function signatures, e.g. 'safeMint(uint256,bytes)'")
  .action((signatures: string[]) => {
    for (const signature of signatures) {
      const parsed = parseSignature(signature);
      // eslint-disable-next-line no-console
      console.log(`${t.blue(parsed.selector)}  ${parsed.canonical}`);
    }
  });
