/**
 * エラー応答とコマンドのシリアライズ
 *
 * エラーはJSON-RPC形式のエンベロープに変換する。
 * 内部エラーの詳細はパスを除去し、スタックトレースは含めない。
 */
import { isPathGuardError, type PathGuardError } from '@cedar-mcp/path-guard';
import { sanitizeErrorMessage } from '../audit/filter.js';
import { isDomainError, type DomainError } from '../domain/errors.js';
import type { EditCommand } from '../engine/types.js';

export const ERROR_CODES = {
  // アプリケーション定義
  SECURITY_ERROR: -32001,
  PARSE_ERROR_CEDAR: -32002,
  EXECUTION_ERROR: -32003,
  // JSON-RPC標準
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

export type RequestId = string | number | null;

export type ErrorEnvelope = {
  jsonrpc: '2.0';
  id: RequestId;
  error: {
    code: number;
    message: string;
    data: Record<string, unknown>;
  };
};

const envelope = (
  id: RequestId,
  code: number,
  message: string,
  data: Record<string, unknown>
): ErrorEnvelope => ({ jsonrpc: '2.0', id, error: { code, message, data } });

const SECURITY_SUGGESTIONS: Readonly<Record<PathGuardError['code'], readonly string[]>> = {
  ROOT_INVALID: ['Pass an existing directory inside the project root'],
  PATH_ESCAPE: [
    'Verify the path is within the project root',
    "Avoid '..' segments and symlinks that point outside the root",
  ],
  DENYLIST_VIOLATION: ['Check file patterns against denylist', 'Protected files cannot be read or edited'],
  READ_ONLY_VIOLATION: [
    'Ensure server is not in read-only mode (if writing)',
    'Use dry_run to preview changes without writing',
  ],
  SIZE_LIMIT_EXCEEDED: ['Edit a smaller file or raise max_file_size in the policy'],
};

const PARSE_SUGGESTIONS = [
  'Check CEDARScript syntax',
  'Valid commands: UPDATE, CREATE, DELETE, MOVE',
  'Use parse_cedarscript tool to validate before applying',
];

/** 実行エラーのメッセージから対処方法を選ぶ */
export function executionSuggestions(message: string): string[] {
  const lower = message.toLowerCase();
  if (lower.includes('file not found')) {
    return [
      'Verify the file path is correct',
      'Check if file exists in project root',
      'Consider using CREATE command if file should be created',
    ];
  }
  if (lower.includes('marker not found') || lower.includes('marker is ambiguous')) {
    return [
      'Re-analyze the file structure (it may have changed)',
      'Use a marker that matches exactly one whole line (surrounding whitespace is ignored)',
    ];
  }
  return ['Re-run parse_cedarscript to validate command syntax'];
}

function securityDetails(error: PathGuardError): Record<string, unknown> {
  switch (error.code) {
    case 'ROOT_INVALID':
      return { reason: error.reason };
    case 'DENYLIST_VIOLATION':
      return { pattern: error.pattern };
    case 'SIZE_LIMIT_EXCEEDED':
      return { actual: error.actual, limit: error.limit };
    case 'PATH_ESCAPE':
    case 'READ_ONLY_VIOLATION':
      return {};
  }
}

function translateDomainError(error: DomainError, id: RequestId): ErrorEnvelope {
  switch (error.code) {
    case 'PARSE_ERROR':
      return envelope(id, ERROR_CODES.PARSE_ERROR_CEDAR, 'CEDARScript parse error', {
        type: 'ParseError',
        details: error.message,
        line: error.line,
        column: error.column,
        suggestions: PARSE_SUGGESTIONS,
      });
    case 'EXECUTION_ERROR':
      return envelope(id, ERROR_CODES.EXECUTION_ERROR, 'CEDARScript execution failed', {
        type: 'ExecutionError',
        command_index: error.commandIndex ?? null,
        details: error.message,
        suggestions: executionSuggestions(error.message),
      });
    case 'INVALID_PARAMS':
      return envelope(id, ERROR_CODES.INVALID_PARAMS, 'Invalid params', {
        type: 'InvalidParams',
        details: error.message,
      });
  }
}

/**
 * 任意のエラーをエラー応答に変換する
 * パス検証エラーのメッセージは検証対象の（ユーザー指定の）パスのみを含む
 */
export function translateError(error: unknown, id: RequestId): ErrorEnvelope {
  if (isPathGuardError(error)) {
    return envelope(id, ERROR_CODES.SECURITY_ERROR, 'Security violation', {
      type: 'SecurityError',
      kind: error.code,
      details: error.message,
      path: error.path,
      ...securityDetails(error),
      suggestions: SECURITY_SUGGESTIONS[error.code],
    });
  }

  if (isDomainError(error)) {
    return translateDomainError(error, id);
  }

  return envelope(id, ERROR_CODES.INTERNAL_ERROR, 'Internal server error', {
    type: error instanceof Error ? error.name : 'Error',
    details: sanitizeErrorMessage(error),
  });
}

export function methodNotFound(method: string, id: RequestId): ErrorEnvelope {
  return envelope(id, ERROR_CODES.METHOD_NOT_FOUND, 'Method not found', {
    type: 'MethodNotFound',
    details: `Unknown tool: ${method}`,
  });
}

/**
 * コマンドをJSONに変換する（parse_cedarscript の応答用）
 */
export function serializeCommand(command: EditCommand): Record<string, unknown> {
  switch (command.type) {
    case 'CreateFile':
      return { type: command.type, target: command.target, content: command.content, line: command.line };
    case 'DeleteFile':
      return { type: command.type, target: command.target, line: command.line };
    case 'MoveFile':
      return {
        type: command.type,
        target: command.target,
        destination: command.destination,
        line: command.line,
      };
    case 'UpdateFile': {
      const { action } = command;
      return {
        type: command.type,
        target: command.target,
        action: action.kind,
        ...(action.kind === 'insert_line' && { position: action.position }),
        ...(action.kind !== 'replace_whole' && { marker: action.marker }),
        ...(action.kind !== 'delete_line' && { content: action.content }),
        line: command.line,
      };
    }
  }
}
