/**
 * パス閉じ込め・操作ポリシー検証
 *
 * ファイルの読み書き前に、要求されたパスについて以下を順に検証する:
 * 1. 閉じ込め: 正規化後のパスがルート自身またはその子孫か
 * 2. denylist: ルート相対パスが機密ファイルパターンに一致しないか
 * 3. read-only: 書き込み意図がread-onlyポリシーで禁止されていないか
 * 4. サイズ: read意図で既存の通常ファイルがサイズ上限以内か
 *
 * ルートを逸脱したパスはdenylist照合にもstatにも到達しない。
 * 検証とその後のファイル操作はアトミックではない（検証後にリンクが差し替えられる余地は残る）。
 * 呼び出し側は元の文字列ではなく返された正規パスを使うこと。
 */
import * as path from 'node:path';
import * as E from 'fp-ts/Either';
import {
  denylistViolationError,
  pathEscapeError,
  readOnlyViolationError,
  rootInvalidError,
  sizeLimitExceededError,
  type PathGuardError,
} from './errors.js';
import { DEFAULT_DENYLIST, DEFAULT_MAX_FILE_SIZE } from './defaults.js';
import { compileDenylist, findMatchingPattern } from './glob.js';
import { canonicalize, isWithinRoot, statIfExists } from './resolve.js';
import type { AccessIntent, PathValidator, PathValidatorOptions, Policy } from './types.js';

/**
 * ルート候補を検証し、正規パスを返す
 * 存在しない/ディレクトリでない場合は ROOT_INVALID
 */
export function validateRoot(candidate: string): E.Either<PathGuardError, string> {
  const canonical = canonicalize(candidate, process.cwd());
  if (E.isLeft(canonical)) {
    return E.left(rootInvalidError(candidate, 'not_found'));
  }

  const stat = statIfExists(canonical.right);
  if (stat === undefined) {
    return E.left(rootInvalidError(candidate, 'not_found'));
  }
  if (!stat.isDirectory()) {
    return E.left(rootInvalidError(candidate, 'not_directory'));
  }

  return E.right(canonical.right);
}

function assertMaxFileSize(value: number): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new RangeError(`maxFileSize must be a positive integer: ${value}`);
  }
}

/**
 * Validatorを構築する
 *
 * ルートは構築時に1度だけ正規化し、以降の比較はすべてこの正規形で行う。
 * denylistは構築時にコンパイルし、検証ごとに再パースしない。
 *
 * @returns 成功時はRight(PathValidator)、ルートが不正な場合はLeft(ROOT_INVALID)
 */
export function createPathValidator(
  options: PathValidatorOptions
): E.Either<PathGuardError, PathValidator> {
  const maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
  assertMaxFileSize(maxFileSize);

  const rootResult = validateRoot(options.root);
  if (E.isLeft(rootResult)) {
    return rootResult;
  }

  const policy: Policy = Object.freeze({
    root: rootResult.right,
    readOnly: options.readOnly ?? false,
    maxFileSize,
    // 指定された場合は既定リストを完全に置き換える
    denylist: Object.freeze([...(options.denylist ?? DEFAULT_DENYLIST)]),
  });
  const compiled = compileDenylist(policy.denylist);

  const validatePath = (raw: string, intent: AccessIntent): E.Either<PathGuardError, string> => {
    // 1. 正規化 + 閉じ込め
    const resolved = canonicalize(raw, policy.root);
    if (E.isLeft(resolved)) {
      return E.left(pathEscapeError(raw));
    }
    const canonical = resolved.right;
    if (!isWithinRoot(policy.root, canonical)) {
      return E.left(pathEscapeError(raw, canonical));
    }

    // 2. denylist（ルート相対パスに対して照合）
    const relative = path.relative(policy.root, canonical);
    const pattern = findMatchingPattern(compiled, relative);
    if (pattern !== undefined) {
      return E.left(denylistViolationError(raw, pattern));
    }

    // 3. read-only
    if (intent === 'write' && policy.readOnly) {
      return E.left(readOnlyViolationError(raw));
    }

    // 4. サイズ（存在する通常ファイルのみ）
    if (intent === 'read') {
      const stat = statIfExists(canonical);
      if (stat?.isFile() && stat.size > policy.maxFileSize) {
        return E.left(sizeLimitExceededError(raw, stat.size, policy.maxFileSize));
      }
    }

    return E.right(canonical);
  };

  return E.right({
    policy,
    validatePath,
    validateRoot,
  });
}
