/**
 * 環境変数の読み込みとバリデーション
 * 未設定の項目は undefined のまま返し、既定値はサーバー設定の解決時に適用する
 */
import { z } from "zod";

export const LOG_LEVELS = ["DEBUG", "INFO", "WARNING", "ERROR"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_FORMATS = ["text", "json"] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

const booleanString = z
  .string()
  .transform((v) => v.trim().toLowerCase())
  .pipe(z.enum(["true", "false"]))
  .transform((v) => v === "true");

const positiveIntString = z
  .string()
  .regex(/^\d+$/, "must be a positive integer")
  .transform(Number)
  .pipe(z.number().int().positive().max(Number.MAX_SAFE_INTEGER));

// 環境変数スキーマ定義
const envSchema = z.object({
  // 編集対象のルートディレクトリ（デフォルト: カレントディレクトリ）
  CEDARSCRIPT_ROOT: z.string().min(1).optional(),

  // read-onlyモード（true/false）
  CEDARSCRIPT_READ_ONLY: booleanString.optional(),

  // 読み取りファイルサイズ上限（バイト）
  CEDARSCRIPT_MAX_FILE_SIZE: positiveIntString.optional(),

  // ログレベル・形式
  CEDARSCRIPT_LOG_LEVEL: z
    .string()
    .transform((v) => v.toUpperCase())
    .pipe(z.enum(LOG_LEVELS))
    .optional(),
  CEDARSCRIPT_LOG_FORMAT: z
    .string()
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(LOG_FORMATS))
    .optional(),

  // ポリシーファイル（YAML）
  CEDARSCRIPT_POLICY: z.string().min(1).optional(),

  // 監査ログ出力先（ファイルパス）
  AUDIT_LOG_PATH: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * 環境変数を読み込み、バリデーションを実行
 * 空文字列は未設定として扱う
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const present = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== "")
  );
  const result = envSchema.safeParse(present);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new Error(`ENV_VALIDATION_FAILED: ${errors}`);
  }

  return result.data;
}
