import { z } from 'zod';
import type { PolicyDocument, ValidationResult } from './types.js';

export const PolicyDocumentSchema = z
  .object({
    version: z.union([z.string(), z.number()]).transform(String).optional(),
    read_only: z.boolean().optional(),
    max_file_size: z.number().int().positive().optional(),
    denylist: z.array(z.string().min(1)).optional(),
  })
  .strict();

export function validatePolicy(input: unknown): ValidationResult<PolicyDocument> {
  // 空のYAMLドキュメントは空のポリシーとして扱う
  const result = PolicyDocumentSchema.safeParse(input ?? {});
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
    return { ok: false, errors };
  }
  return { ok: true, value: result.data };
}
