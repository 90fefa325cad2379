/**
 * ドメインエラー定義
 *
 * パス検証のエラー（PathGuardError）は @cedar-mcp/path-guard 側で定義する。
 * ここではコマンドの解析・実行・ツール引数に関するエラーを扱う。
 */
import type { PathGuardError } from '@cedar-mcp/path-guard';

export type DomainErrorCode = 'PARSE_ERROR' | 'EXECUTION_ERROR' | 'INVALID_PARAMS';

export interface DomainError {
  readonly _tag: 'DomainError';
  readonly code: DomainErrorCode;
  readonly message: string;
  /** PARSE_ERROR: 1始まりの行・列 */
  readonly line?: number;
  readonly column?: number;
  /** EXECUTION_ERROR: 失敗したコマンドの位置（0始まり） */
  readonly commandIndex?: number;
  readonly cause?: unknown;
}

/** ハンドラが扱うエラー全体 */
export type AppError = DomainError | PathGuardError;

export const parseError = (message: string, line: number, column: number): DomainError => ({
  _tag: 'DomainError',
  code: 'PARSE_ERROR',
  message,
  line,
  column,
});

export const executionError = (
  message: string,
  commandIndex: number,
  cause?: unknown
): DomainError => ({
  _tag: 'DomainError',
  code: 'EXECUTION_ERROR',
  message,
  commandIndex,
  ...(cause !== undefined && { cause }),
});

export const invalidParamsError = (message: string): DomainError => ({
  _tag: 'DomainError',
  code: 'INVALID_PARAMS',
  message,
});

export function isDomainError(value: unknown): value is DomainError {
  return (
    typeof value === 'object' &&
    value !== null &&
    '_tag' in value &&
    value._tag === 'DomainError'
  );
}
