/**
 * 機密データフィルタリング
 * ログ・エラー応答にホストのパスやファイル内容を残さないためのユーティリティ
 */
import { createHash } from 'node:crypto';

/**
 * 文字列のSHA256ダイジェストを生成
 * 内容をログに残さず、検証用ハッシュのみ記録
 */
export function computeDigest(content: string): string {
  return `sha256:${createHash('sha256').update(content, 'utf8').digest('hex')}`;
}

/**
 * 文字列中の絶対パスを '[PATH]' に置換
 */
export function redactPaths(message: string): string {
  return message.replace(/\/[^\s'"]+/g, '[PATH]');
}

/**
 * エラーメッセージから機密情報を除去
 * スタックトレースやパス情報を含まない安全なメッセージを返す
 */
export function sanitizeErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    // スタックトレースは除外、メッセージのみ
    return redactPaths(error.message);
  }
  return redactPaths(String(error));
}
