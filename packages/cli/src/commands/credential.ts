/**
 * tollgate credential — Issue a registration credential
 *
 * Usage:
 *   tollgate credential <integration> <implementation> <admin>
 *
 * Prints the 65-byte credential as hex, signed with the stored registrar
 * key. For a standalone integration, integration and implementation are
 * the same address; behind a proxy, they are the proxy and its logic unit.
 */

import { Command } from 'commander';
import { bytesToHex, toAddress } from '@tollgate/runtime-host';
import { issueRegistrationCredential } from '@tollgate/kernel';
import { loadRegistrarKey } from '../keys/registrar-key.js';
import { openHome } from '../home.js';
import { t } from '../output/theme.js';

export const credentialCommand = new Command('credential')
  .description('Sign a registration credential for (integration, implementation, admin)')
  .argument('<integration>', 'Caller-facing address (the proxy, or the integration itself)')
  .argument('<implementation>', 'Logic unit address')
  .argument('<admin>', 'Security Admin that will submit the credential')
  .option('--home <dir>', 'Tollgate home directory')
  .action((integration: string, implementation: string, admin: string, options: { home?: string }) => {
    const key = loadRegistrarKey(openHome(options.home));
    if (key === undefined) {
      // eslint-disable-next-line no-console
      console.error(t.red('No registrar key. Run `tollgate keygen` first.'));
      process.exitCode = 1;
      return;
    }
    const credential = issueRegistrationCredential(
      { integration: toAddress(integration), implementation: toAddress(implementation), admin: toAddress(admin) },
      key.privateKey,
    );
    // eslint-disable-next-line no-console
    console.log(bytesToHex(credential));
  });
