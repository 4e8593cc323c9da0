/**
 * CLI Module Loader
 *
 * Reads the entry file and every module reachable through `use`
 * statements. `use name` resolves to `<dir of the importing file>/name.<ext>`.
 * Each file is parsed once, however many modules import it.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { parseSource } from './parser/index.js';
import { CompileError, type ModuleNode, type ProgramNode, type SyltError } from './types.js';

export interface LoadOptions {
  /** Module file extension, without the dot */
  readonly extension?: string;
}

export interface LoadResult {
  /** Modules in discovery order; the entry module is first */
  readonly program: ProgramNode;
  /** Lexer, parse and missing-module errors from every file */
  readonly errors: SyltError[];
}

/**
 * Load a module and its dependencies breadth-first.
 *
 * @param entry - Path of the entry file
 * @throws Error if the entry file does not exist
 */
export async function loadProgram(entry: string, options: LoadOptions = {}): Promise<LoadResult> {
  const extension = options.extension ?? 'sy';

  let source: string;
  try {
    source = await fs.readFile(entry, 'utf-8');
  } catch {
    throw new Error(`File not found: ${entry}`);
  }

  const modules: ModuleNode[] = [];
  const errors: SyltError[] = [];
  const seen = new Set<string>([path.resolve(entry)]);
  const queue: { file: string; source: string }[] = [{ file: entry, source }];

  for (let next = queue.shift(); next; next = queue.shift()) {
    const parsed = parseSource(next.source, next.file);
    modules.push(parsed.ast);
    errors.push(...parsed.errors);

    for (const statement of parsed.ast.statements) {
      if (statement.type !== 'Use') continue;
      const file = path.join(path.dirname(next.file), `${statement.module}.${extension}`);
      const canonical = path.resolve(file);
      if (seen.has(canonical)) continue;
      seen.add(canonical);

      try {
        queue.push({ file, source: await fs.readFile(file, 'utf-8') });
      } catch {
        errors.push(
          new CompileError(
            'SYLT-C016',
            { name: statement.module, path: file },
            { file: next.file, line: statement.span.start.line }
          )
        );
      }
    }
  }

  return { program: { type: 'Program', modules }, errors };
}
