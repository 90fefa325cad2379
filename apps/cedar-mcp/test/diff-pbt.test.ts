/**
 * 行diffのProperty-Based Testing
 */
import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { diffLines, unifiedDiff } from '../src/engine/diff.js';
import { LinesArb } from './arbitraries.js';

describe('diffLines properties', () => {
  it('Property: removed and kept lines reproduce the old text', () => {
    fc.assert(
      fc.property(LinesArb, LinesArb, (before, after) => {
        const ops = diffLines(before, after);
        expect(ops.filter((op) => op.kind !== '+').map((op) => op.text)).toEqual(before);
      })
    );
  });

  it('Property: added and kept lines reproduce the new text', () => {
    fc.assert(
      fc.property(LinesArb, LinesArb, (before, after) => {
        const ops = diffLines(before, after);
        expect(ops.filter((op) => op.kind !== '-').map((op) => op.text)).toEqual(after);
      })
    );
  });

  it('Property: identical inputs produce only context and an empty diff', () => {
    fc.assert(
      fc.property(LinesArb, (lines) => {
        expect(diffLines(lines, lines).every((op) => op.kind === ' ')).toBe(true);
        const text = lines.map((line) => `${line}\n`).join('');
        expect(unifiedDiff('f.txt', text, text)).toBe('');
      })
    );
  });
});
