/**
 * @cedar-mcp/path-guard - パス閉じ込めと操作ポリシー検証
 *
 * - ルート配下への閉じ込め（`..`、絶対パス、シンボリックリンクによる逸脱の検出）
 * - 機密ファイルのdenylist（globパターン）
 * - read-onlyモード
 * - 読み取りファイルサイズ上限
 */
export { createPathValidator, validateRoot } from './validator.js';
export {
  compilePattern,
  compileDenylist,
  matchPattern,
  findMatchingPattern,
  matchesAny,
  splitRelativePath,
  type CompiledPattern,
} from './glob.js';
export { canonicalize, isWithinRoot, type CanonicalizeFailure } from './resolve.js';
export { DEFAULT_DENYLIST, DEFAULT_MAX_FILE_SIZE, MAX_SYMLINK_EXPANSIONS } from './defaults.js';
export * from './errors.js';
export type { AccessIntent, Policy, PathValidator, PathValidatorOptions } from './types.js';
