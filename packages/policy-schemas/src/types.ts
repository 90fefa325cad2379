/**
 * ポリシーファイル（YAML）の型
 * キーはすべて省略可能。省略されたキーは環境変数/既定値から補われる
 */
export interface PolicyDocument {
  version?: string;
  read_only?: boolean;
  max_file_size?: number;
  /** 指定した場合は既定denylistを完全に置き換える */
  denylist?: string[];
}

/** Validatorへ渡す上書き値（camelCase） */
export interface PolicyOverrides {
  readOnly?: boolean;
  maxFileSize?: number;
  denylist?: string[];
}

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; errors: string[] };
