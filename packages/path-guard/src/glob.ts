/**
 * denylist用のglobマッチャー
 *
 * - `*`  : 1セグメント内の任意の文字列（空文字列を含む）
 * - `?`  : 1セグメント内の任意の1文字
 * - `**` : 0個以上の任意のセグメント（セグメント全体が `**` の場合のみ）
 *
 * パターンはルート相対パス全体に対してアンカーされる（部分一致ではない）。
 * ファイルシステムI/Oは一切行わない純粋な文字列/セグメント照合。
 */
import * as path from 'node:path';

type SegmentMatcher =
  | { readonly kind: 'globstar' }
  | { readonly kind: 'literal'; readonly text: string }
  // サロゲートペアを1文字として扱うためコードポイント単位で保持する
  | { readonly kind: 'wildcard'; readonly chars: readonly string[] };

export interface CompiledPattern {
  readonly source: string;
  readonly segments: readonly SegmentMatcher[];
}

// パターン側は '/' とネイティブ区切り文字の両方を受け付ける
const PATTERN_SEPARATOR = path.sep === '/' ? /\// : /[\\/]/;

function compileSegment(segment: string): SegmentMatcher {
  if (segment === '**') return { kind: 'globstar' };
  if (segment.includes('*') || segment.includes('?')) return { kind: 'wildcard', chars: Array.from(segment) };
  return { kind: 'literal', text: segment };
}

/**
 * パターンをセグメント単位の照合器にコンパイル
 * Policy構築時に1度だけ呼び、以降の照合では再パースしない
 */
export function compilePattern(pattern: string): CompiledPattern {
  const segments = pattern
    .split(PATTERN_SEPARATOR)
    .filter((s) => s.length > 0)
    .map(compileSegment);
  return { source: pattern, segments };
}

export function compileDenylist(patterns: readonly string[]): readonly CompiledPattern[] {
  return Object.freeze(patterns.map(compilePattern));
}

/**
 * 1セグメント内のワイルドカード照合（バックトラック位置を1つだけ保持する線形照合）
 * 両方ともコードポイントの配列
 */
function wildcardMatch(pattern: readonly string[], text: readonly string[]): boolean {
  let pi = 0;
  let ti = 0;
  let starAt = -1;
  let resumeAt = 0;

  while (ti < text.length) {
    const p = pattern[pi];
    if (p === '*') {
      starAt = pi;
      resumeAt = ti;
      pi++;
    } else if (p !== undefined && (p === '?' || p === text[ti])) {
      pi++;
      ti++;
    } else if (starAt !== -1) {
      // 直前の '*' にもう1文字吸収させて再試行
      pi = starAt + 1;
      resumeAt++;
      ti = resumeAt;
    } else {
      return false;
    }
  }

  while (pattern[pi] === '*') pi++;
  return pi === pattern.length;
}

function matchSegment(matcher: SegmentMatcher, segment: string): boolean {
  switch (matcher.kind) {
    case 'literal':
      return matcher.text === segment;
    case 'wildcard':
      return wildcardMatch(matcher.chars, Array.from(segment));
    case 'globstar':
      return true;
  }
}

function matchFrom(
  matchers: readonly SegmentMatcher[],
  mi: number,
  segments: readonly string[],
  si: number
): boolean {
  let m = mi;
  let s = si;
  while (m < matchers.length) {
    const matcher = matchers[m];
    if (matcher === undefined) return false;

    if (matcher.kind === 'globstar') {
      // 連続する ** は1つとして扱う
      let next = m + 1;
      while (matchers[next]?.kind === 'globstar') next++;
      if (next === matchers.length) return true;
      for (let k = s; k <= segments.length; k++) {
        if (matchFrom(matchers, next, segments, k)) return true;
      }
      return false;
    }

    const segment = segments[s];
    if (segment === undefined || !matchSegment(matcher, segment)) return false;
    m++;
    s++;
  }
  return s === segments.length;
}

/**
 * ルート相対パスをネイティブ区切り文字でセグメントに分割
 */
export function splitRelativePath(relativePath: string): string[] {
  return relativePath.split(path.sep).filter((s) => s.length > 0);
}

export function matchPattern(compiled: CompiledPattern, relativePath: string): boolean {
  return matchFrom(compiled.segments, 0, splitRelativePath(relativePath), 0);
}

/**
 * 最初に一致したパターン（元の文字列）を返す。一致なしは undefined
 * 評価順はリスト順、最初の一致で打ち切る
 */
export function findMatchingPattern(
  compiled: readonly CompiledPattern[],
  relativePath: string
): string | undefined {
  const segments = splitRelativePath(relativePath);
  for (const pattern of compiled) {
    if (matchFrom(pattern.segments, 0, segments, 0)) return pattern.source;
  }
  return undefined;
}

/**
 * 未コンパイルのパターン列に対する簡易判定
 */
export function matchesAny(relativePath: string, patterns: readonly string[]): boolean {
  return findMatchingPattern(compileDenylist(patterns), relativePath) !== undefined;
}
