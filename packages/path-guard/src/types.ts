/**
 * パスガードの型定義
 */
import type * as E from 'fp-ts/Either';
import type { PathGuardError } from './errors.js';

/** アクセス意図 */
export type AccessIntent = 'read' | 'write';

/**
 * 検証ポリシー（構築後は不変）
 */
export interface Policy {
  /** 正規化済み（シンボリックリンク解決済み）の絶対パス */
  readonly root: string;
  readonly readOnly: boolean;
  /** read意図で既存の通常ファイルにのみ適用 */
  readonly maxFileSize: number;
  /** ルート相対パスに対して評価するglobパターン（評価順=配列順） */
  readonly denylist: readonly string[];
}

export interface PathValidatorOptions {
  root: string;
  readOnly?: boolean;
  maxFileSize?: number;
  denylist?: readonly string[];
}

export interface PathValidator {
  readonly policy: Policy;
  /**
   * パスを検証し、ルート配下の正規パスを返す
   * 検証順序: 閉じ込め → denylist → read-only → サイズ
   */
  validatePath(raw: string, intent: AccessIntent): E.Either<PathGuardError, string>;
  /**
   * 呼び出しごとに渡されるルート候補を検証する
   * このValidator自身の閉じ込め境界は変更しない
   */
  validateRoot(candidate: string): E.Either<PathGuardError, string>;
}
