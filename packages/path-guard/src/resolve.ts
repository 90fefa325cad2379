/**
 * 正規パス解決
 *
 * コンポーネント単位でパスを辿り、すべてのシンボリックリンク（リンク先が存在しないものを含む）を展開する。
 * `..` はリンク展開後の実パスに対して適用する（字句的な正規化は行わない）。
 * 存在しない、または調べられない（権限・名前長など）コンポーネントはそのまま連結する。
 * 解決中にファイルシステムのエラーで例外を送出することはない。
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as E from 'fp-ts/Either';
import { MAX_SYMLINK_EXPANSIONS } from './defaults.js';

export type CanonicalizeFailure = 'symlink_loop' | 'nul_byte';

const COMPONENT_SEPARATOR = path.sep === '/' ? '/' : /[\\/]/;

function splitComponents(p: string): string[] {
  return p.split(COMPONENT_SEPARATOR).filter((c) => c.length > 0);
}

/** fsが返すエラー（errnoコード付き）か */
function isFsError(e: unknown): boolean {
  return e instanceof Error && 'code' in e && typeof e.code === 'string';
}

/**
 * lstat（失敗した場合は undefined）
 * ENOENT以外（EACCES, ENAMETOOLONG, ELOOP 等）もリンクではないコンポーネントとして扱う
 */
function lstatOrUndefined(p: string): fs.Stats | undefined {
  try {
    return fs.lstatSync(p);
  } catch (e) {
    if (isFsError(e)) return undefined;
    throw e;
  }
}

function readlinkOrUndefined(p: string): string | undefined {
  try {
    return fs.readlinkSync(p);
  } catch (e) {
    if (isFsError(e)) return undefined;
    throw e;
  }
}

/**
 * stat（シンボリックリンクを辿る、存在しない・調べられない場合は undefined）
 * 調べられないファイルの実際の読み込みエラーは呼び出し側の入出力で表面化する
 */
export function statIfExists(p: string): fs.Stats | undefined {
  try {
    return fs.statSync(p);
  } catch (e) {
    if (isFsError(e)) return undefined;
    throw e;
  }
}

/**
 * 入力パスを正規の絶対パスに解決する
 *
 * @param input 相対または絶対パス
 * @param base 相対パスの基準ディレクトリ（正規化済みであること）
 * @returns 成功時はRight(正規パス)、リンクループ/NULバイトはLeft
 */
export function canonicalize(input: string, base: string): E.Either<CanonicalizeFailure, string> {
  if (input.includes('\0')) return E.left('nul_byte');

  // path.join は字句的に `..` を畳み込むため使わない
  const absolute = path.isAbsolute(input) ? input : `${base}${path.sep}${input}`;
  const { root } = path.parse(absolute);

  // 末尾から取り出すため逆順で保持
  const pending = splitComponents(absolute.slice(root.length)).reverse();
  let current = root;
  let expansions = 0;

  for (let part = pending.pop(); part !== undefined; part = pending.pop()) {
    if (part === '.') continue;
    if (part === '..') {
      current = path.dirname(current);
      continue;
    }

    const next = path.join(current, part);
    const target = lstatOrUndefined(next)?.isSymbolicLink() ? readlinkOrUndefined(next) : undefined;

    if (target !== undefined) {
      expansions++;
      if (expansions > MAX_SYMLINK_EXPANSIONS) return E.left('symlink_loop');

      if (path.isAbsolute(target)) {
        const targetRoot = path.parse(target).root;
        current = targetRoot;
        pending.push(...splitComponents(target.slice(targetRoot.length)).reverse());
      } else {
        // 相対リンクはリンクを含むディレクトリ（current）基準
        pending.push(...splitComponents(target).reverse());
      }
      continue;
    }

    current = next;
  }

  return E.right(current);
}

/**
 * candidate が root 自身またはその子孫かをコンポーネント単位で判定
 * 両方とも正規パスであること
 */
export function isWithinRoot(root: string, candidate: string): boolean {
  const rel = path.relative(root, candidate);
  if (rel === '') return true;
  if (path.isAbsolute(rel)) return false;
  return rel !== '..' && !rel.startsWith(`..${path.sep}`);
}
