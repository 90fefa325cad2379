import { parse } from 'yaml';
import type { PolicyDocument, PolicyOverrides, ValidationResult } from './types.js';
import { validatePolicy } from './schemas.js';

export function parsePolicy(yamlContent: string): ValidationResult<PolicyDocument> {
  let parsed: unknown;
  try {
    parsed = parse(yamlContent);
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, errors: [`YAML parse error: ${message}`] };
  }
  return validatePolicy(parsed);
}

/**
 * ポリシードキュメントをValidatorの上書き値に変換
 * ドキュメントに存在するキーのみを含める
 */
export function toPolicyOverrides(doc: PolicyDocument): PolicyOverrides {
  return {
    ...(doc.read_only !== undefined && { readOnly: doc.read_only }),
    ...(doc.max_file_size !== undefined && { maxFileSize: doc.max_file_size }),
    ...(doc.denylist !== undefined && { denylist: doc.denylist }),
  };
}
