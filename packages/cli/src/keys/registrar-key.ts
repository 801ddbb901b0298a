/**
 * Tollgate CLI — Registrar Key Store
 *
 * The registrar key signs registration credentials. It is kept as PEM in
 * `<home>/state/registrar-key.json`:
 *
 *   { "algorithm": "ed25519", "created_at": "...", "public_key": "...", "private_key": "..." }
 */

import { createPrivateKey, createPublicKey, generateKeyPairSync } from 'node:crypto';
import type { KeyObject } from 'node:crypto';
import type { StateIO } from '@tollgate/runtime-host';

export const REGISTRAR_KEY_FILE = 'registrar-key.json';

export interface RegistrarKeyFile {
  readonly algorithm: 'ed25519';
  readonly created_at: string;
  readonly public_key: string;
  readonly private_key: string;
}

export interface RegistrarKey {
  readonly createdAt: string;
  readonly publicKey: KeyObject;
  readonly privateKey: KeyObject;
}

export function isRegistrarKeyFile(value: unknown): value is RegistrarKeyFile {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'algorithm' in value &&
    value.algorithm === 'ed25519' &&
    'created_at' in value &&
    typeof value.created_at === 'string' &&
    'public_key' in value &&
    typeof value.public_key === 'string' &&
    'private_key' in value &&
    typeof value.private_key === 'string'
  );
}

/** Generate a key pair and write it, replacing any existing key. */
export function createRegistrarKey(stateIO: StateIO, now: Date = new Date()): RegistrarKey {
  const { publicKey, privateKey } = generateKeyPairSync('ed25519');
  const file: RegistrarKeyFile = {
    algorithm: 'ed25519',
    created_at: now.toISOString(),
    public_key: publicKey.export({ type: 'spki', format: 'pem' }).toString(),
    private_key: privateKey.export({ type: 'pkcs8', format: 'pem' }).toString(),
  };
  stateIO.writeJson(REGISTRAR_KEY_FILE, file);
  return { createdAt: file.created_at, publicKey, privateKey };
}

/** The stored key, or undefined if none has been generated. */
export function loadRegistrarKey(stateIO: StateIO): RegistrarKey | undefined {
  const file = stateIO.readJson<RegistrarKeyFile | undefined>(
    REGISTRAR_KEY_FILE,
    undefined,
    (value): value is RegistrarKeyFile | undefined => isRegistrarKeyFile(value),
  );
  if (file === undefined) return undefined;
  return {
    createdAt: file.created_at,
    publicKey: createPublicKey(file.public_key),
    privateKey: createPrivateKey(file.private_key),
  };
}
