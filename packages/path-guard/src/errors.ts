/**
 * @cedar-mcp/path-guard エラー型定義
 * 5種類のポリシー違反をTagged Unionで表現し、呼び出し側がメッセージ文字列に依存せず分岐できるようにする
 */

// ========== エラーコード ==========

export type PathGuardErrorCode =
  | 'ROOT_INVALID' // ルートが存在しない、またはディレクトリではない
  | 'PATH_ESCAPE' // 正規化後のパスがルート配下にない
  | 'DENYLIST_VIOLATION' // ルート相対パスがdenylistパターンに一致
  | 'READ_ONLY_VIOLATION' // read-onlyポリシーに対する書き込み
  | 'SIZE_LIMIT_EXCEEDED'; // 既存ファイルがサイズ上限を超過

interface PathGuardErrorBase<C extends PathGuardErrorCode> {
  readonly _tag: 'PathGuardError';
  readonly code: C;
  readonly message: string;
  /** 呼び出し側が渡した元のパス文字列 */
  readonly path: string;
}

export type RootInvalidReason = 'not_found' | 'not_directory';

export interface RootInvalidError extends PathGuardErrorBase<'ROOT_INVALID'> {
  readonly reason: RootInvalidReason;
}

export interface PathEscapeError extends PathGuardErrorBase<'PATH_ESCAPE'> {
  /** 解決後の正規パス（解決できなかった場合は undefined） */
  readonly resolved?: string;
}

export interface DenylistViolationError extends PathGuardErrorBase<'DENYLIST_VIOLATION'> {
  readonly pattern: string;
}

export type ReadOnlyViolationError = PathGuardErrorBase<'READ_ONLY_VIOLATION'>;

export interface SizeLimitExceededError extends PathGuardErrorBase<'SIZE_LIMIT_EXCEEDED'> {
  readonly actual: number;
  readonly limit: number;
}

export type PathGuardError =
  | RootInvalidError
  | PathEscapeError
  | DenylistViolationError
  | ReadOnlyViolationError
  | SizeLimitExceededError;

// ========== エラー生成関数 ==========

export const rootInvalidError = (path: string, reason: RootInvalidReason): RootInvalidError => ({
  _tag: 'PathGuardError',
  code: 'ROOT_INVALID',
  message:
    reason === 'not_found'
      ? `Root directory does not exist: ${path}`
      : `Root path is not a directory: ${path}`,
  path,
  reason,
});

export const pathEscapeError = (path: string, resolved?: string): PathEscapeError => {
  const result: PathEscapeError = {
    _tag: 'PathGuardError',
    code: 'PATH_ESCAPE',
    message: `Path escape attempt: '${path}' resolves outside root directory`,
    path,
  };
  if (resolved !== undefined) {
    return { ...result, resolved };
  }
  return result;
};

export const denylistViolationError = (path: string, pattern: string): DenylistViolationError => ({
  _tag: 'PathGuardError',
  code: 'DENYLIST_VIOLATION',
  message: `Path matches denylist pattern '${pattern}': ${path}`,
  path,
  pattern,
});

export const readOnlyViolationError = (path: string): ReadOnlyViolationError => ({
  _tag: 'PathGuardError',
  code: 'READ_ONLY_VIOLATION',
  message: `Write operation rejected: server in read-only mode (${path})`,
  path,
});

export const sizeLimitExceededError = (
  path: string,
  actual: number,
  limit: number
): SizeLimitExceededError => ({
  _tag: 'PathGuardError',
  code: 'SIZE_LIMIT_EXCEEDED',
  message: `File exceeds maximum size (${actual} > ${limit} bytes): ${path}`,
  path,
  actual,
  limit,
});

// ========== 型ガード ==========

export const isPathGuardError = (e: unknown): e is PathGuardError =>
  typeof e === 'object' &&
  e !== null &&
  '_tag' in e &&
  e._tag === 'PathGuardError';
