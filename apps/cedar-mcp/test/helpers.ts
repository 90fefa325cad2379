/**
 * テスト用の一時プロジェクトとコンテキスト
 */
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import * as E from 'fp-ts/Either';
import { createPathValidator, type PathValidator, type PathValidatorOptions } from '@cedar-mcp/path-guard';
import type { AuditEntry, AuditLog } from '../src/audit/log.js';
import type { ServerConfig } from '../src/config/serverConfig.js';
import { createServerContext, type ServerContext, type ServerContextOverrides } from '../src/core/context.js';
import { createLogger } from '../src/logging/logger.js';

export const MAIN_PY = 'import os\n\ndef main():\n    print("hi")\n    return 0\n';

export interface TempProject {
  /** 正規化済み（realpath）のルート */
  root: string;
  /** ルートと同じ親を持つ、ルート外のディレクトリ */
  outside: string;
  read: (relative: string) => string;
  exists: (relative: string) => boolean;
  cleanup: () => void;
}

export function createTempProject(): TempProject {
  const parent = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'cedar-mcp-test-')));
  const root = path.join(parent, 'Project');
  const outside = path.join(parent, 'Outside');
  fs.mkdirSync(root);
  fs.mkdirSync(outside);

  fs.writeFileSync(path.join(root, 'main.py'), MAIN_PY);
  fs.writeFileSync(path.join(root, 'README.md'), '# Demo\n');
  fs.mkdirSync(path.join(root, 'src'));
  fs.writeFileSync(path.join(root, 'src', 'utils.py'), 'def helper():\n    pass\n');
  fs.writeFileSync(path.join(root, '.env'), 'API_KEY=test-secret\n');
  fs.writeFileSync(path.join(outside, 'secret.txt'), 'outside\n');

  return {
    root,
    outside,
    read: (relative) => fs.readFileSync(path.join(root, relative), 'utf8'),
    exists: (relative) => fs.existsSync(path.join(root, relative)),
    cleanup: () => fs.rmSync(parent, { recursive: true, force: true }),
  };
}

export function mustCreateValidator(options: PathValidatorOptions): PathValidator {
  const result = createPathValidator(options);
  if (E.isLeft(result)) throw new Error(result.left.message);
  return result.right;
}

export function testConfig(root: string, overrides: Partial<ServerConfig> = {}): ServerConfig {
  return {
    root,
    readOnly: false,
    maxFileSize: 10 * 1024 * 1024,
    logLevel: 'ERROR',
    logFormat: 'text',
    ...overrides,
  };
}

export interface TestContext {
  context: ServerContext;
  audits: AuditEntry[];
  logs: string[];
}

/** 監査ログ・診断ログをメモリに集め、リクエストIDを連番にしたコンテキスト */
export function createTestContext(
  config: ServerConfig,
  overrides: ServerContextOverrides = {}
): TestContext {
  const audits: AuditEntry[] = [];
  const logs: string[] = [];
  const audit: AuditLog = {
    path: undefined,
    record: (entry) => {
      audits.push(entry);
    },
  };
  let counter = 0;

  const result = createServerContext(config, {
    logger: createLogger({
      name: 'test',
      level: config.logLevel,
      format: config.logFormat,
      sink: (line) => {
        logs.push(line);
      },
    }),
    audit,
    nextRequestId: () => `req_${++counter}`,
    ...overrides,
  });
  if (E.isLeft(result)) throw new Error(result.left.message);
  return { context: result.right, audits, logs };
}
