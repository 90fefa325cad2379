/**
 * サーバーコンテキスト
 * 起動時に一度だけ構築し、すべてのハンドラに明示的に渡す
 */
import { randomUUID } from 'node:crypto';
import * as E from 'fp-ts/Either';
import { createPathValidator, type PathGuardError, type PathValidator } from '@cedar-mcp/path-guard';
import { createAuditLog, type AuditLog } from '../audit/log.js';
import type { ServerConfig } from '../config/serverConfig.js';
import { createFileEditEngine } from '../engine/executor.js';
import type { EditEngine } from '../engine/types.js';
import { createLogger, type Logger } from '../logging/logger.js';

export const SERVER_NAME = 'cedarscript-mcp-server';
export const SERVER_VERSION = '0.1.0';

export interface ServerContext {
  readonly config: ServerConfig;
  readonly validator: PathValidator;
  readonly engine: EditEngine;
  readonly logger: Logger;
  readonly audit: AuditLog;
  /** リクエストIDの生成（テストで差し替え可能） */
  readonly nextRequestId: () => string;
}

export interface ServerContextOverrides {
  engine?: EditEngine;
  logger?: Logger;
  audit?: AuditLog;
  nextRequestId?: () => string;
}

const defaultRequestId = (): string => `req_${randomUUID().slice(0, 8)}`;

export function createServerContext(
  config: ServerConfig,
  overrides: ServerContextOverrides = {}
): E.Either<PathGuardError, ServerContext> {
  const validator = createPathValidator({
    root: config.root,
    readOnly: config.readOnly,
    maxFileSize: config.maxFileSize,
    ...(config.denylist && { denylist: config.denylist }),
  });
  if (E.isLeft(validator)) return validator;

  const logger =
    overrides.logger ??
    createLogger({ name: SERVER_NAME, level: config.logLevel, format: config.logFormat });

  return E.right({
    config,
    validator: validator.right,
    engine: overrides.engine ?? createFileEditEngine(),
    logger,
    audit: overrides.audit ?? createAuditLog(config.auditLogPath, { logger }),
    nextRequestId: overrides.nextRequestId ?? defaultRequestId,
  });
}
