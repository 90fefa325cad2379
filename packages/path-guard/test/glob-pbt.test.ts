/**
 * Property-Based Tests for denylist matcher
 *
 * 法則の検証:
 * 1. `**` は任意の相対パスに一致する
 * 2. ワイルドカードを含まないパターンは自分自身とだけ一致する
 * 3. `prefix/**` は prefix 配下のすべてに一致する
 * 4. 最初に一致したパターンがリスト順で返される
 */
import { describe, it } from 'vitest';
import * as fc from 'fast-check';
import * as path from 'node:path';
import {
  compileDenylist,
  compilePattern,
  findMatchingPattern,
  matchPattern,
} from '../src/index.js';
import { AnySegmentsArb, LiteralSegmentArb } from './arbitraries.js';

describe('Property: matchPattern', () => {
  it('Property: ** は任意の相対パスに一致する', () => {
    const globstar = compilePattern('**');
    fc.assert(
      fc.property(AnySegmentsArb, (segments) => matchPattern(globstar, path.join(...segments)))
    );
  });

  it('Property: リテラルパターンは同じパスに一致する', () => {
    fc.assert(
      fc.property(AnySegmentsArb, (segments) =>
        matchPattern(compilePattern(segments.join('/')), segments.join(path.sep))
      )
    );
  });

  it('Property: リテラルパターンはセグメントを1つ追加したパスには一致しない', () => {
    fc.assert(
      fc.property(AnySegmentsArb, LiteralSegmentArb, (segments, extra) => {
        const pattern = compilePattern(segments.join('/'));
        return !matchPattern(pattern, [...segments, extra].join(path.sep));
      })
    );
  });

  it('Property: prefix/** は prefix 配下のすべてのパスに一致する', () => {
    fc.assert(
      fc.property(LiteralSegmentArb, AnySegmentsArb, (prefix, rest) =>
        matchPattern(compilePattern(`${prefix}/**`), [prefix, ...rest].join(path.sep))
      )
    );
  });

  it('Property: * は1セグメントのパスにのみ一致する', () => {
    const star = compilePattern('*');
    fc.assert(
      fc.property(AnySegmentsArb, (segments) =>
        matchPattern(star, segments.join(path.sep)) === (segments.length === 1)
      )
    );
  });

  it('Property: *.ext は末尾が .ext のルート直下ファイルに一致する', () => {
    const pattern = compilePattern('*.ext');
    fc.assert(
      fc.property(LiteralSegmentArb, (name) => matchPattern(pattern, `${name}.ext`))
    );
  });
});

describe('Property: findMatchingPattern', () => {
  it('Property: 一致するパターンが複数あればリスト先頭側を返す', () => {
    fc.assert(
      fc.property(AnySegmentsArb, (segments) => {
        const relative = segments.join(path.sep);
        const literal = segments.join('/');
        const compiled = compileDenylist([literal, '**']);
        const reversed = compileDenylist(['**', literal]);
        return (
          findMatchingPattern(compiled, relative) === literal &&
          findMatchingPattern(reversed, relative) === '**'
        );
      })
    );
  });

  it('Property: 空のdenylistは何にも一致しない', () => {
    fc.assert(
      fc.property(AnySegmentsArb, (segments) =>
        findMatchingPattern(compileDenylist([]), segments.join(path.sep)) === undefined
      )
    );
  });
});
