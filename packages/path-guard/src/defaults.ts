/**
 * 既定値
 * denylistを明示的に渡した場合は既定リストを完全に置き換える（マージしない）
 */

/** 既定のファイルサイズ上限: 10 MiB */
export const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

/**
 * 既定のdenylist
 * VCSメタデータ、依存/キャッシュディレクトリ、環境変数ファイル、認証情報/鍵/証明書
 */
export const DEFAULT_DENYLIST: readonly string[] = Object.freeze([
  '.git/**',
  'node_modules/**',
  '__pycache__/**',
  '.env',
  '*.env',
  '.env.*',
  'credentials.json',
  '*.key',
  '*.pem',
]);

/** シンボリックリンク展開回数の上限（超えた場合はループとみなす） */
export const MAX_SYMLINK_EXPANSIONS = 40;
