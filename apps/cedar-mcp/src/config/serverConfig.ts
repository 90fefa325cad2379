/**
 * サーバー設定の解決
 *
 * 各設定の優先順位: CLI > 環境変数 > ポリシーファイル > 既定値
 * denylist はポリシーファイルからのみ設定できる
 */
import { readFile } from 'node:fs/promises';
import * as E from 'fp-ts/Either';
import { DEFAULT_MAX_FILE_SIZE } from '@cedar-mcp/path-guard';
import { parsePolicy, toPolicyOverrides, type PolicyOverrides } from '@cedar-mcp/policy-schemas';
import type { CliOptions } from './cli.js';
import type { Env, LogFormat, LogLevel } from './env.js';

export interface ServerConfig {
  readonly root: string;
  readonly readOnly: boolean;
  readonly maxFileSize: number;
  /** 未指定なら既定のdenylist */
  readonly denylist?: readonly string[];
  readonly logLevel: LogLevel;
  readonly logFormat: LogFormat;
  readonly policyPath?: string;
  readonly auditLogPath?: string;
}

export function resolveServerConfig(
  env: Env,
  cli: CliOptions,
  policy: PolicyOverrides = {},
  cwd: string = process.cwd()
): ServerConfig {
  const policyPath = cli.policy ?? env.CEDARSCRIPT_POLICY;
  return {
    root: cli.root ?? env.CEDARSCRIPT_ROOT ?? cwd,
    readOnly: cli.readOnly ?? env.CEDARSCRIPT_READ_ONLY ?? policy.readOnly ?? false,
    maxFileSize:
      cli.maxFileSize ?? env.CEDARSCRIPT_MAX_FILE_SIZE ?? policy.maxFileSize ?? DEFAULT_MAX_FILE_SIZE,
    ...(policy.denylist && { denylist: policy.denylist }),
    logLevel: cli.logLevel ?? env.CEDARSCRIPT_LOG_LEVEL ?? 'INFO',
    logFormat: cli.logFormat ?? env.CEDARSCRIPT_LOG_FORMAT ?? 'text',
    ...(policyPath && { policyPath }),
    ...(env.AUDIT_LOG_PATH && { auditLogPath: env.AUDIT_LOG_PATH }),
  };
}

/**
 * ポリシーファイルを読み込み、上書き設定に変換する
 */
export async function loadPolicyFile(filePath: string): Promise<E.Either<string, PolicyOverrides>> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (e) {
    const reason = e instanceof Error && 'code' in e ? String(e.code) : String(e);
    return E.left(`Cannot read policy file ${filePath}: ${reason}`);
  }

  const parsed = parsePolicy(text);
  if (!parsed.ok) {
    return E.left(`Invalid policy file ${filePath}: ${parsed.errors.join('; ')}`);
  }
  return E.right(toPolicyOverrides(parsed.value));
}
