/**
 * MCPツールハンドラ
 *
 * すべてのハンドラは起動時に構築した ServerContext を受け取る。
 * 失敗はエラーエンベロープ（isError付き）として返し、例外はここで止める。
 */
import * as path from 'node:path';
import * as E from 'fp-ts/Either';
import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { readOnlyViolationError } from '@cedar-mcp/path-guard';
import { sanitizeErrorMessage } from '../audit/filter.js';
import { invalidParamsError, type AppError } from '../domain/errors.js';
import { unifiedDiff } from '../engine/diff.js';
import { methodNotFound, serializeCommand, translateError, type ErrorEnvelope } from './adapters.js';
import { SERVER_NAME, SERVER_VERSION, type ServerContext } from './context.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
};

/**
 * 統一されたToolResult生成ヘルパー
 * content（後方互換性用テキスト）とstructuredContent（構造化データ）の両方を生成
 */
function createToolResult<T extends Record<string, unknown>>(
  data: T,
  options: { isError?: boolean } = {}
): ToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(data) }],
    structuredContent: data,
    ...(options.isError && { isError: true }),
  };
}

// ========== 引数スキーマ ==========

const ParseArgsSchema = z.object({
  content: z.string(),
});

const ApplyArgsSchema = z.object({
  commands: z.string(),
  root: z.string().min(1).optional(),
  dry_run: z.boolean().default(true),
});

function formatZodError(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`).join(', ');
}

// ========== 応答ヘルパー ==========

function success(
  context: ServerContext,
  op: string,
  requestId: string,
  data: Record<string, unknown>,
  paths?: readonly string[]
): ToolResult {
  context.audit.record({ requestId, op, ok: true, ...(paths && { paths }) });
  return createToolResult({ ...data, request_id: requestId });
}

function failure(
  context: ServerContext,
  op: string,
  requestId: string,
  error: unknown,
  paths?: readonly string[]
): ToolResult {
  const envelope: ErrorEnvelope = translateError(error, requestId);
  // セキュリティエラーは種別、それ以外はエラー型名を記録する
  const kind = envelope.error.data['kind'] ?? envelope.error.data['type'];
  const errorCode = typeof kind === 'string' ? kind : String(envelope.error.code);
  context.audit.record({ requestId, op, ok: false, errorCode, ...(paths && { paths }) });
  context.logger.warn(`${op} failed: ${envelope.error.message}`, {
    request_id: requestId,
    code: errorCode,
  });
  return createToolResult(envelope, { isError: true });
}

// ========== ハンドラ ==========

/**
 * parse_cedarscript: コマンドを解析して構造を返す（ファイルには触れない）
 */
export async function handleParse(
  context: ServerContext,
  args: Record<string, unknown>
): Promise<ToolResult> {
  const requestId = context.nextRequestId();
  const input = ParseArgsSchema.safeParse(args);
  if (!input.success) {
    const error = invalidParamsError(formatZodError(input.error));
    return failure(context, 'parse_cedarscript', requestId, error);
  }

  const parsed = context.engine.parse(input.data.content);
  if (E.isLeft(parsed)) {
    return failure(context, 'parse_cedarscript', requestId, parsed.left);
  }

  context.logger.debug(`Parsed ${parsed.right.length} command(s)`, { request_id: requestId });
  return success(context, 'parse_cedarscript', requestId, {
    success: true,
    count: parsed.right.length,
    commands: parsed.right.map(serializeCommand),
  });
}

/**
 * 呼び出しごとの root を検証する
 * セッションのルート自身またはその配下のディレクトリのみ許可（狭めることはできても広げられない）
 */
function resolveScopeRoot(context: ServerContext, root: string | undefined): E.Either<AppError, string> {
  const { validator } = context;
  if (root === undefined) return E.right(validator.policy.root);

  const candidate = path.isAbsolute(root) ? root : `${validator.policy.root}${path.sep}${root}`;
  const directory = validator.validateRoot(candidate);
  if (E.isLeft(directory)) return directory;
  return validator.validatePath(directory.right, 'read');
}

/**
 * apply_cedarscript: コマンドを検証・計画し、dry_run=false の場合のみ書き込む
 */
export async function handleApply(
  context: ServerContext,
  args: Record<string, unknown>
): Promise<ToolResult> {
  const op = 'apply_cedarscript';
  const requestId = context.nextRequestId();
  const input = ApplyArgsSchema.safeParse(args);
  if (!input.success) {
    return failure(context, op, requestId, invalidParamsError(formatZodError(input.error)));
  }
  const { commands: source, root, dry_run: dryRun } = input.data;
  const { validator, engine, logger } = context;

  const baseDir = resolveScopeRoot(context, root);
  if (E.isLeft(baseDir)) return failure(context, op, requestId, baseDir.left);

  if (!dryRun && validator.policy.readOnly) {
    return failure(context, op, requestId, readOnlyViolationError(root ?? '.'));
  }

  const parsed = engine.parse(source);
  if (E.isLeft(parsed)) return failure(context, op, requestId, parsed.left);
  const commands = parsed.right;

  const plan = await engine.plan(commands, { validator, baseDir: baseDir.right, dryRun });
  if (E.isLeft(plan)) return failure(context, op, requestId, plan.left);
  const touched = plan.right.changes.map((c) => c.path);

  if (dryRun) {
    logger.info(`Dry run: ${commands.length} command(s), ${touched.length} file(s) would change`, {
      request_id: requestId,
    });
    return success(
      context,
      op,
      requestId,
      {
        success: true,
        dry_run: true,
        command_count: commands.length,
        changes: plan.right.changes.map((c) => ({
          path: c.displayPath,
          action: c.action,
          diff: unifiedDiff(c.displayPath, c.before, c.after),
        })),
      },
      touched
    );
  }

  const committed = await engine.commit(plan.right);
  if (E.isLeft(committed)) return failure(context, op, requestId, committed.left, touched);

  logger.info(`Applied ${commands.length} command(s), ${touched.length} file(s) changed`, {
    request_id: requestId,
  });
  return success(
    context,
    op,
    requestId,
    {
      success: true,
      dry_run: false,
      command_count: commands.length,
      results: committed.right.map((o) => ({
        command_index: o.commandIndex,
        type: o.type,
        path: o.target,
        summary: o.summary,
      })),
      changes: plan.right.changes.map((c) => ({ path: c.displayPath, action: c.action })),
    },
    touched
  );
}

/**
 * list_capabilities: サーバー情報と現在のセキュリティ設定
 */
export async function handleListCapabilities(context: ServerContext): Promise<ToolResult> {
  const requestId = context.nextRequestId();
  const { engine, validator } = context;
  return success(context, 'list_capabilities', requestId, {
    server: SERVER_NAME,
    version: SERVER_VERSION,
    engine: { name: engine.name, version: engine.version },
    features: {
      commands: engine.features.commands,
      actions: engine.features.actions,
      dry_run: engine.features.dryRun,
    },
    security: {
      path_validation: true,
      read_only_mode: true,
      file_size_limits: true,
      read_only: validator.policy.readOnly,
      max_file_size: validator.policy.maxFileSize,
      denylist: [...validator.policy.denylist],
    },
  });
}

/**
 * ツール名でハンドラにディスパッチする
 * ハンドラ内の想定外の例外は INTERNAL_ERROR として返す
 */
export async function dispatchTool(
  context: ServerContext,
  name: string,
  args: Record<string, unknown>
): Promise<ToolResult> {
  try {
    switch (name) {
      case 'parse_cedarscript':
        return await handleParse(context, args);
      case 'apply_cedarscript':
        return await handleApply(context, args);
      case 'list_capabilities':
        return await handleListCapabilities(context);
      default: {
        const requestId = context.nextRequestId();
        context.logger.warn(`Unknown tool: ${name}`, { request_id: requestId });
        return createToolResult(methodNotFound(name, requestId), { isError: true });
      }
    }
  } catch (e) {
    const requestId = context.nextRequestId();
    context.logger.error(`Tool ${name} failed: ${sanitizeErrorMessage(e)}`, { request_id: requestId });
    return failure(context, name, requestId, e);
  }
}

// ========== ツール定義 ==========

export const TOOL_DEFINITIONS: Tool[] = [
  {
    name: 'parse_cedarscript',
    description:
      'Parse CEDARScript edit commands and return their structure without touching any file. Use it to check syntax before apply_cedarscript.',
    inputSchema: {
      type: 'object',
      properties: {
        content: { type: 'string', description: 'CEDARScript commands' },
      },
      required: ['content'],
    },
  },
  {
    name: 'apply_cedarscript',
    description:
      'Apply CEDARScript edit commands to files under the project root. Defaults to a dry run that returns unified diffs; set dry_run=false to write. Paths outside the root, protected files and, in read-only mode, all writes are rejected.',
    inputSchema: {
      type: 'object',
      properties: {
        commands: { type: 'string', description: 'CEDARScript commands' },
        root: {
          type: 'string',
          description: 'Directory to resolve relative paths against (must be inside the server root)',
        },
        dry_run: {
          type: 'boolean',
          description: 'Preview changes without writing (default: true)',
          default: true,
        },
      },
      required: ['commands'],
    },
  },
  {
    name: 'list_capabilities',
    description: 'List supported commands and the current security settings of the server.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
];
