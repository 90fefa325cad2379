#!/usr/bin/env node
/**
 * CEDARScript MCP Server (stdio)
 *
 * 起動時に設定（CLI > 環境変数 > ポリシーファイル > 既定値）を解決し、
 * パス検証器を含む ServerContext を一度だけ構築する。
 */
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import * as E from 'fp-ts/Either';
import type { PolicyOverrides } from '@cedar-mcp/policy-schemas';
import { sanitizeErrorMessage } from './audit/filter.js';
import { parseCliArgs, USAGE } from './config/cli.js';
import { loadEnv } from './config/env.js';
import { loadPolicyFile, resolveServerConfig } from './config/serverConfig.js';
import { createServerContext, SERVER_NAME, SERVER_VERSION } from './core/context.js';
import { createMcpServer } from './server.js';

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
  const cli = parseCliArgs(argv);
  if (E.isLeft(cli)) {
    console.error(`[${SERVER_NAME}] ${cli.left}`);
    console.error(USAGE);
    process.exit(2);
  }
  if (cli.right.help) {
    console.error(USAGE);
    return;
  }
  if (cli.right.version) {
    console.error(`${SERVER_NAME} ${SERVER_VERSION}`);
    return;
  }

  // 環境変数読み込み
  const env = loadEnv();

  // ポリシーファイル（任意）
  const policyPath = cli.right.policy ?? env.CEDARSCRIPT_POLICY;
  let policy: PolicyOverrides = {};
  if (policyPath) {
    const loaded = await loadPolicyFile(policyPath);
    if (E.isLeft(loaded)) {
      throw new Error(loaded.left);
    }
    policy = loaded.right;
  }

  const config = resolveServerConfig(env, cli.right, policy);
  const context = createServerContext(config);
  if (E.isLeft(context)) {
    throw new Error(context.left.message);
  }
  const { logger, validator } = context.right;

  logger.info(`Starting ${SERVER_NAME} v${SERVER_VERSION}`);
  logger.info(`Root: ${validator.policy.root}`);
  logger.info(`Read-only: ${validator.policy.readOnly}`);
  logger.info(`Max file size: ${validator.policy.maxFileSize} bytes`);
  logger.debug(`Denylist: ${validator.policy.denylist.join(', ')}`);
  if (config.auditLogPath) {
    logger.info('Audit log enabled');
  }

  const server = createMcpServer(context.right);

  // トランスポート接続
  const transport = new StdioServerTransport();
  await server.connect(transport);

  // Graceful shutdown ハンドラ
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    try {
      await server.close();
    } catch (e) {
      logger.error(`Error during shutdown: ${sanitizeErrorMessage(e)}`);
    }
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((err) => {
  console.error(`[${SERVER_NAME}] Fatal error:`, sanitizeErrorMessage(err));
  process.exit(1);
});
