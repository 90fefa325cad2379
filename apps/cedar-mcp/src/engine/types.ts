/**
 * 編集コマンドとエンジンの型定義
 */
import type * as E from 'fp-ts/Either';
import type { PathValidator } from '@cedar-mcp/path-guard';
import type { AppError, DomainError } from '../domain/errors.js';

export type InsertPosition = 'before' | 'after';

export type UpdateAction =
  | { readonly kind: 'replace_whole'; readonly content: string }
  | { readonly kind: 'delete_line'; readonly marker: string }
  | { readonly kind: 'replace_line'; readonly marker: string; readonly content: string }
  | {
      readonly kind: 'insert_line';
      readonly position: InsertPosition;
      readonly marker: string;
      readonly content: string;
    };

/** `line` はコマンド先頭キーワードの行（1始まり） */
export type EditCommand =
  | { readonly type: 'CreateFile'; readonly target: string; readonly content: string; readonly line: number }
  | { readonly type: 'UpdateFile'; readonly target: string; readonly action: UpdateAction; readonly line: number }
  | { readonly type: 'DeleteFile'; readonly target: string; readonly line: number }
  | {
      readonly type: 'MoveFile';
      readonly target: string;
      readonly destination: string;
      readonly line: number;
    };

export type ChangeAction = 'create' | 'update' | 'delete';

/**
 * 計画済みのファイル単位の変更
 * `path` は検証済みの正規パス、`displayPath` はセッションルート相対
 */
export interface FileChange {
  readonly path: string;
  readonly displayPath: string;
  readonly action: ChangeAction;
  readonly before: string | null;
  readonly after: string | null;
  /** このファイルに最後に触れたコマンドの位置 */
  readonly commandIndex: number;
}

export interface CommandOutcome {
  readonly commandIndex: number;
  readonly type: EditCommand['type'];
  readonly target: string;
  readonly summary: string;
}

export interface EditPlan {
  readonly dryRun: boolean;
  readonly changes: readonly FileChange[];
  readonly outcomes: readonly CommandOutcome[];
}

export interface PlanScope {
  readonly validator: PathValidator;
  /** 相対パスの基準ディレクトリ（セッションルートまたはその配下） */
  readonly baseDir: string;
  readonly dryRun: boolean;
}

export interface EngineFeatures {
  readonly commands: readonly string[];
  readonly actions: readonly string[];
  readonly dryRun: boolean;
}

export interface EditEngine {
  readonly name: string;
  readonly version: string;
  readonly features: EngineFeatures;
  parse(text: string): E.Either<DomainError, EditCommand[]>;
  plan(commands: readonly EditCommand[], scope: PlanScope): Promise<E.Either<AppError, EditPlan>>;
  commit(plan: EditPlan): Promise<E.Either<AppError, readonly CommandOutcome[]>>;
}
