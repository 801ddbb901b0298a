/**
 * Tollgate Runtime Host — Function Signatures and Selectors
 *
 * A signature is the canonical text `name(type,type,...)` with no spaces.
 * Its selector is the first four bytes of SHA3-256 over that text, so the
 * same operation always maps to the same 4-byte key.
 */

import { createHash } from 'node:crypto';
import { toSelector } from '../types/address.js';
import type { Selector } from '../types/address.js';
import { isAbiType } from './types.js';
import type { AbiType } from './types.js';

export interface ParsedSignature {
  readonly name: string;
  readonly params: ReadonlyArray<AbiType>;
  /** Canonical text, whitespace removed. */
  readonly canonical: string;
  readonly selector: Selector;
}

const SIGNATURE_PATTERN = /^([A-Za-z_][A-Za-z0-9_]*)\((.*)\)$/;

/**
 * Parse and canonicalize a function signature.
 *
 * @throws {TypeError} If the text is not `name(types)` or names an unknown type
 */
export function parseSignature(signature: string): ParsedSignature {
  const compact = signature.replace(/\s+/g, '');
  const match = SIGNATURE_PATTERN.exec(compact);
  const name = match?.[1];
  const body = match?.[2];
  if (name === undefined || body === undefined) {
    throw new TypeError(`Invalid function signature: ${signature}`);
  }

  const params: AbiType[] = [];
  if (body.length > 0) {
    for (const part of body.split(',')) {
      if (!isAbiType(part)) {
        throw new TypeError(`Unsupported parameter type '${part}' in ${signature}`);
      }
      params.push(part);
    }
  }

  const canonical = `${name}(${params.join(',')})`;
  return { name, params, canonical, selector: computeSelector(canonical) };
}

/** Selector of a signature, e.g. `selectorOf('safeMint(uint256,bytes)')`. */
export function selectorOf(signature: string): Selector {
  return parseSignature(signature).selector;
}

function computeSelector(canonical: string): Selector {
  const digest = createHash('sha3-256').update(canonical).digest('hex');
  return toSelector('0x' + digest.slice(0, 8));
}
