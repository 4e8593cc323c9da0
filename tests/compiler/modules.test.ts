/**
 * sylt Module Tests
 * Namespaces, qualified access and compile order across files
 */

import { describe, expect, it } from 'vitest';

import { formatValue, moduleKey, VM, type CompileResult } from '../../src/index.js';
import { compileSources } from '../helpers/runtime.js';

function runModules(files: Record<string, string>): string[] {
  const result = compileSources(files);
  if (!result.success) {
    throw new Error(result.errors.map((err) => err.format()).join('\n'));
  }
  const printed: string[] = [];
  const run = new VM(result.program, {
    callbacks: { onPrint: (value) => printed.push(formatValue(value)) },
  }).run();
  if (!run.success) throw run.errors[0];
  return printed;
}

function errorsOf(result: CompileResult): string[] {
  return result.success ? [] : result.errors.map((err) => err.format());
}

describe('sylt Modules', () => {
  it('derives the namespace key from the file stem', () => {
    expect(moduleKey('lib/util.sy')).toBe('util');
    expect(moduleKey('main')).toBe('main');
  });

  it('reads globals of an imported module', () => {
    expect(runModules({ 'main.sy': 'use util\nprint util.x', 'util.sy': 'x := 42' })).toEqual([
      '42',
    ]);
  });

  it('runs imported modules before the entry module', () => {
    const printed = runModules({
      'main.sy': 'print "main"\nuse util',
      'util.sy': 'print "util"',
    });
    expect(printed).toEqual(['util', 'main']);
  });

  it('attributes each op to the file it came from', () => {
    const result = compileSources({ 'main.sy': 'use util\nprint util.x', 'util.sy': 'x := 42' });
    expect(result.success && result.program.blocks[0]?.files).toEqual([
      'main.sy',
      'util.sy',
      'util.sy',
      'main.sy',
      'main.sy',
      'main.sy',
      'main.sy',
    ]);
  });

  it('assigns to a global of another module', () => {
    expect(
      runModules({ 'main.sy': 'use util\nutil.x = 5\nprint util.x', 'util.sy': 'x := 1' })
    ).toEqual(['5']);
  });

  it('calls functions and instantiates blobs through the alias', () => {
    const printed = runModules({
      'main.sy': [
        'use geo',
        'p: geo.Point = geo.Point { x: 1, y: 2 }',
        'print geo.sum(p)',
      ].join('\n'),
      'geo.sy': [
        'blob Point { x: int, y: int }',
        'sum :: fn p: Point -> int {',
        '  ret p.x + p.y',
        '}',
      ].join('\n'),
    });
    expect(printed).toEqual(['3']);
  });

  it('keeps module globals apart when names repeat', () => {
    const printed = runModules({
      'main.sy': 'use other\nx := 1\nprint x\nprint other.x',
      'other.sy': 'x := 2',
    });
    expect(printed).toEqual(['1', '2']);
  });

  describe('errors', () => {
    it('rejects two modules with the same key', () => {
      const result = compileSources({ 'main.sy': 'print 1', 'lib/main.sy': 'x := 1' });
      expect(errorsOf(result)).toEqual(["lib/main.sy:1: Reading module 'main' twice"]);
    });

    it('rejects use of a module that was not loaded', () => {
      const result = compileSources({ 'main.sy': 'use nothing' });
      expect(errorsOf(result)).toEqual(["main.sy:1: Unknown module 'nothing'"]);
    });

    it('rejects a module used as a value', () => {
      const result = compileSources({ 'main.sy': 'use util\nprint util', 'util.sy': '' });
      expect(errorsOf(result)).toEqual(["main.sy:2: 'util' is a module, not a value"]);
    });

    it('reports unknown qualified names with their module', () => {
      const result = compileSources({ 'main.sy': 'use util\nprint util.y', 'util.sy': 'x := 1' });
      expect(errorsOf(result)).toEqual([
        "main.sy:2: No active variable called 'util.y' could be found",
      ]);
    });

    it('reports errors in imported modules with their file', () => {
      const result = compileSources({ 'main.sy': 'use util', 'util.sy': 'print y' });
      expect(errorsOf(result)).toEqual([
        "util.sy:1: No active variable called 'y' could be found",
      ]);
    });
  });
});
