/**
 * CLI Shared Utilities
 * Common formatting functions for CLI tools
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { formatOp, type Program } from './compiler/index.js';
import type { ObservabilityCallbacks } from './runtime/index.js';
import { SyltError } from './types.js';

/**
 * Format error for stderr output
 *
 * sylt errors print as `file:line: message`; anything else prints its message.
 */
export function formatError(err: unknown): string {
  if (err instanceof SyltError) return err.format();
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Format every error, one per line */
export function formatErrors(errors: readonly unknown[]): string {
  return errors.map(formatError).join('\n');
}

/**
 * Observability callbacks printing one line per executed op:
 * `<block name> <ip> [<stack depth>] <op>`
 */
export function traceObserver(
  program: Program,
  write: (line: string) => void
): ObservabilityCallbacks {
  return {
    onInstruction: ({ block, ip, op, depth }) => {
      const name = program.blocks[block]?.name ?? `#${block}`;
      const where = `${name} ${String(ip).padStart(4, '0')}`;
      write(`${where} [${depth}] ${formatOp(op, program)}`);
    },
  };
}

/**
 * Package version from package.json, which sits one directory above both
 * src/ and dist/.
 */
export async function readVersion(): Promise<string> {
  const packageJsonPath = path.resolve(
    path.dirname(fileURLToPath(import.meta.url)),
    '../package.json'
  );
  const packageJson: unknown = JSON.parse(await fs.readFile(packageJsonPath, 'utf-8'));
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  throw new Error(`No version in ${packageJsonPath}`);
}
