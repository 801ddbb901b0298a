/**
 * Tollgate Kernel — Kernel Purity Test
 *
 * Statically verifies that packages/kernel/src/ contains no imports of
 * side-effectful Node.js modules:
 *   - node:fs, fs (filesystem I/O)
 *   - node:child_process, child_process (subprocess execution)
 *   - node:net, net (raw network sockets)
 *
 * node:crypto is allowed: hashing and Ed25519 verification are pure
 * computation. Persistence reaches the kernel only through an injected
 * StateIO.
 */

import { describe, it, expect } from 'vitest';
import { readdirSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

const testDir = fileURLToPath(new URL('.', import.meta.url));
const kernelSrcDir = join(testDir, '..', 'src');

const FORBIDDEN_IMPORT_PATTERNS: ReadonlyArray<{ label: string; pattern: RegExp }> = [
  { label: 'node:fs', pattern: /from ['"]node:fs(\/promises)?['"]/ },
  { label: "'fs' (bare)", pattern: /from ['"]fs(\/promises)?['"]/ },
  { label: 'node:child_process', pattern: /from ['"](node:)?child_process['"]/ },
  { label: 'node:net', pattern: /from ['"](node:)?net['"]/ },
  { label: 'node:http', pattern: /from ['"](node:)?https?['"]/ },
];

function collectTsFiles(dir: string): string[] {
  const files: string[] = [];
  for (const entry of readdirSync(dir)) {
    const fullPath = join(dir, entry);
    if (statSync(fullPath).isDirectory()) {
      files.push(...collectTsFiles(fullPath));
    } else if (entry.endsWith('.ts') && !entry.endsWith('.d.ts')) {
      files.push(fullPath);
    }
  }
  return files;
}

describe('kernel package must not import side-effectful modules', () => {
  const sourceFiles = collectTsFiles(kernelSrcDir);

  it('kernel/src contains at least one .ts source file (sanity check)', () => {
    expect(sourceFiles.length).toBeGreaterThan(0);
  });

  it.each(FORBIDDEN_IMPORT_PATTERNS)('no kernel source file imports $label', ({ label, pattern }) => {
    const violations = sourceFiles
      .filter((file) => pattern.test(readFileSync(file, 'utf-8')))
      .map((file) => `  ${file.replace(kernelSrcDir + '/', '')} contains forbidden import: ${label}`);

    expect(violations, `Kernel boundary violation:\n${violations.join('\n')}`).toHaveLength(0);
  });

  it('kernel/src does use node:crypto, so the allowance is not vacuous', () => {
    const hasCrypto = sourceFiles.some((file) => /from ['"]node:crypto['"]/.test(readFileSync(file, 'utf-8')));
    expect(hasCrypto).toBe(true);
  });
});
