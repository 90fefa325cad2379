/**
 * 監査ログ（append-only JSONL形式）
 *
 * ツール呼び出し1回につき1レコード。ファイル内容は記録せず、
 * 触れたパスのダイジェストのみを残す。
 */
import { appendFileSync, existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { Logger } from "../logging/logger.js";
import { computeDigest, sanitizeErrorMessage } from "./filter.js";

export interface AuditFileRecord {
  ts: string; // ISO 8601 timestamp
  request_id: string;
  op: string;
  ok: boolean;
  error_code?: string;
  paths_digest?: string;
}

export interface AuditEntry {
  requestId: string;
  op: string;
  ok: boolean;
  errorCode?: string;
  /** 触れたパス（正規パス） */
  paths?: readonly string[];
}

export interface AuditLog {
  readonly path: string | undefined;
  record(entry: AuditEntry): void;
}

export interface AuditLogOptions {
  /** 書き込み失敗の報告先 */
  logger: Logger;
  now?: () => Date;
}

/**
 * 監査ログを作成する
 * パスが未指定の場合は何も出力しない。
 * 書き込みに失敗しても呼び出し元のツール結果は変えず、診断ログに記録する
 */
export function createAuditLog(filePath: string | undefined, options: AuditLogOptions): AuditLog {
  const now = options.now ?? (() => new Date());
  return {
    path: filePath,
    record(entry: AuditEntry): void {
      if (!filePath) return;

      const fullRecord: AuditFileRecord = {
        ts: now().toISOString(),
        request_id: entry.requestId,
        op: entry.op,
        ok: entry.ok,
      };
      if (entry.errorCode) {
        fullRecord.error_code = entry.errorCode;
      }
      if (entry.paths && entry.paths.length > 0) {
        fullRecord.paths_digest = computeDigest(entry.paths.join("\n"));
      }

      try {
        // ディレクトリが存在しない場合は作成
        const dir = dirname(filePath);
        if (!existsSync(dir)) {
          mkdirSync(dir, { recursive: true });
        }
        // JSONL形式で追記（1行1JSON + 改行）
        appendFileSync(filePath, JSON.stringify(fullRecord) + "\n", { encoding: "utf-8" });
      } catch (e) {
        options.logger.error(`Audit log write failed: ${sanitizeErrorMessage(e)}`, {
          request_id: entry.requestId,
        });
      }
    },
  };
}
