/**
 * @cedar-mcp/policy-schemas - YAMLポリシーファイルのスキーマと検証
 *
 * - read_only / max_file_size / denylist の上書き
 * - zodによるスキーマ検証
 */
export { parsePolicy, toPolicyOverrides } from './parser.js';
export { PolicyDocumentSchema, validatePolicy } from './schemas.js';
export type { PolicyDocument, PolicyOverrides, ValidationResult } from './types.js';
