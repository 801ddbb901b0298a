/**
 * tollgate keygen — Generate the registrar key
 *
 * Writes an Ed25519 key pair to <home>/state/registrar-key.json. An existing
 * key is kept unless --force is given.
 */

import { Command } from 'commander';
import { createRegistrarKey, loadRegistrarKey, REGISTRAR_KEY_FILE } from '../keys/registrar-key.js';
import { openHome } from '../home.js';
import { t } from '../output/theme.js';

export const keygenCommand = new Command('keygen')
  .description('Generate the Ed25519 registrar key used to sign registration credentials')
  .option('--home <dir>', 'Tollgate home directory')
  .option('--force', 'Replace an existing key')
  .action((options: { home?: string; force?: boolean }) => {
    const stateIO = openHome(options.home);
    if (options.force !== true && loadRegistrarKey(stateIO) !== undefined) {
      // eslint-disable-next-line no-console
      console.error(t.amber(`${REGISTRAR_KEY_FILE} already exists. Use --force to replace it.`));
      process.exitCode = 1;
      return;
    }
    const key = createRegistrarKey(stateIO);
    // eslint-disable-next-line no-console
    console.log(t.green(`Registrar key written to state/${REGISTRAR_KEY_FILE}`));
    // eslint-disable-next-line no-console
    console.log(key.publicKey.export({ type: 'spki', format: 'pem' }).toString().trimEnd());
  });
