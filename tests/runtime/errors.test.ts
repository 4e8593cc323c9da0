/**
 * sylt Runtime Tests: Error Registry and Error Classes
 */

import { describe, expect, it } from 'vitest';

import {
  CompileError,
  ERROR_REGISTRY,
  ExternError,
  ParseError,
  renderMessage,
  RuntimeError,
  SyltError,
} from '../../src/index.js';

describe('sylt Errors', () => {
  describe('ERROR_REGISTRY', () => {
    it('uses one ID format for every entry', () => {
      for (const [id, definition] of ERROR_REGISTRY.entries()) {
        expect(id).toMatch(/^SYLT-[LPCTR]\d{3}$/);
        expect(definition.errorId).toBe(id);
      }
    });

    it('prefixes IDs by category', () => {
      const prefixes = { lexer: 'L', parse: 'P', compile: 'C', typecheck: 'T', runtime: 'R' };
      for (const definition of ERROR_REGISTRY.entries()) {
        const [id, { category }] = definition;
        expect(id.charAt(5)).toBe(prefixes[category]);
      }
    });
  });

  describe('renderMessage', () => {
    it('fills placeholders from the context', () => {
      expect(renderMessage('Expected {expected}, got {actual}', { expected: 'int', actual: 2 })).toBe(
        'Expected int, got 2'
      );
    });

    it('renders missing values as empty', () => {
      expect(renderMessage('a{gap}b', {})).toBe('ab');
    });

    it('leaves a template with an unclosed brace unchanged', () => {
      expect(renderMessage('broken {name', { name: 'x' })).toBe('broken {name');
    });
  });

  describe('error classes', () => {
    it('rejects unknown IDs', () => {
      expect(() => new SyltError({ errorId: 'SYLT-X999', message: 'nope' })).toThrow(
        'Unknown error ID: SYLT-X999'
      );
    });

    it('rejects IDs of another category', () => {
      expect(() => new RuntimeError('SYLT-C001', { name: 'x' })).toThrow(
        'Expected runtime error ID, got: SYLT-C001'
      );
    });

    it('renders the registry template', () => {
      const error = new CompileError('SYLT-C001', { name: 'x' }, { file: 'a.sy', line: 4 });
      expect(error.message).toBe("No active variable called 'x' could be found");
      expect(error.format()).toBe("a.sy:4: No active variable called 'x' could be found");
    });

    it('formats without a site as the bare message', () => {
      expect(new RuntimeError('SYLT-R002', {}).format()).toBe('Division by zero');
    });

    it('falls back to an unknown file name', () => {
      expect(new ParseError('SYLT-P001', 'Oops', { line: 2 }).format()).toBe('<unknown>:2: Oops');
    });

    it('accepts a custom formatter', () => {
      const error = new ExternError('len', 'broke', { file: 'm.sy', line: 1 });
      expect(error.format((data) => `${data.errorId} ${data.message}`)).toBe(
        "SYLT-R010 Extern function 'len' failed: broke"
      );
      expect(error).toBeInstanceOf(RuntimeError);
    });
  });
});
