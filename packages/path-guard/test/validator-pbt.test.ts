/**
 * Property-Based Tests for path validator
 *
 * 法則の検証:
 * 1. 逸脱: 正規化結果がルート外になるパスは表記によらず PATH_ESCAPE
 * 2. 受理: ルート内でdenylistに一致しないパスは正規パスを返し、再検証しても同じ結果
 * 3. read-only: 書き込みは常に拒否、同じパスの読み取りは成功
 * 4. サイズ: サイズSのファイルは上限Cに対して S <= C のときだけ読み取り可能
 */
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fc from 'fast-check';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as E from 'fp-ts/Either';
import { createPathValidator, type PathValidator } from '../src/index.js';
import { createTempProject, type TempProject } from './helpers.js';
import {
  CeilingArb,
  FileSizeArb,
  IntentArb,
  ParentHopsArb,
  SegmentArb,
  SegmentsArb,
} from './arbitraries.js';

function mustCreate(options: Parameters<typeof createPathValidator>[0]): PathValidator {
  const result = createPathValidator(options);
  if (E.isLeft(result)) throw new Error(result.left.message);
  return result.right;
}

function codeOf(result: E.Either<{ code: string }, string>): string | undefined {
  return E.isLeft(result) ? result.left.code : undefined;
}

describe('Property: validatePath', () => {
  let project: TempProject;
  let validator: PathValidator;
  let readOnly: PathValidator;

  beforeAll(() => {
    project = createTempProject();
    // ルート外へのリンク
    fs.symlinkSync(project.outside, path.join(project.root, 'escape'));
    validator = mustCreate({ root: project.root });
    readOnly = mustCreate({ root: project.root, readOnly: true });
  });

  afterAll(() => {
    project.cleanup();
  });

  it('Property: .. でルートより上に出るパスは PATH_ESCAPE', () => {
    fc.assert(
      fc.property(ParentHopsArb, SegmentsArb, IntentArb, (hops, segments, intent) => {
        const raw = [...Array<string>(hops).fill('..'), ...segments].join('/');
        return codeOf(validator.validatePath(raw, intent)) === 'PATH_ESCAPE';
      })
    );
  });

  it('Property: ルート外の絶対パスは PATH_ESCAPE', () => {
    fc.assert(
      fc.property(SegmentsArb, IntentArb, (segments, intent) => {
        const raw = path.join(project.outside, ...segments);
        return codeOf(validator.validatePath(raw, intent)) === 'PATH_ESCAPE';
      })
    );
  });

  it('Property: ルート外へのシンボリックリンク経由のパスは PATH_ESCAPE', () => {
    fc.assert(
      fc.property(SegmentsArb, IntentArb, (segments, intent) => {
        const raw = ['escape', ...segments].join('/');
        return codeOf(validator.validatePath(raw, intent)) === 'PATH_ESCAPE';
      })
    );
  });

  it('Property: ルート内のパスは正規パスを返す', () => {
    fc.assert(
      fc.property(SegmentsArb, IntentArb, (segments, intent) => {
        // 'escape' リンクを通るパスは除外
        fc.pre(segments[0] !== 'escape');
        const result = validator.validatePath(segments.join('/'), intent);
        expect(result).toEqual(E.right(path.join(project.root, ...segments)));
      })
    );
  });

  it('Property: 打ち消し合う .. を含むパスはルート内に解決される', () => {
    fc.assert(
      fc.property(SegmentArb, SegmentsArb, (detour, segments) => {
        fc.pre(detour !== 'escape' && segments[0] !== 'escape');
        const raw = [detour, '..', ...segments].join('/');
        expect(validator.validatePath(raw, 'read')).toEqual(
          E.right(path.join(project.root, ...segments))
        );
      })
    );
  });

  it('Property: 検証は冪等（結果の正規パスを再検証しても同じ）', () => {
    fc.assert(
      fc.property(SegmentsArb, IntentArb, (segments, intent) => {
        fc.pre(segments[0] !== 'escape');
        const first = validator.validatePath(segments.join('/'), intent);
        const again = validator.validatePath(segments.join('/'), intent);
        expect(again).toEqual(first);
        if (E.isRight(first)) {
          expect(validator.validatePath(first.right, intent)).toEqual(first);
        }
      })
    );
  });

  it('Property: read-onlyでは書き込みは拒否され、読み取りは成功する', () => {
    fc.assert(
      fc.property(SegmentsArb, (segments) => {
        fc.pre(segments[0] !== 'escape');
        const raw = segments.join('/');
        return (
          codeOf(readOnly.validatePath(raw, 'write')) === 'READ_ONLY_VIOLATION' &&
          E.isRight(readOnly.validatePath(raw, 'read'))
        );
      })
    );
  });
});

describe('Property: size ceiling', () => {
  let project: TempProject;
  let counter = 0;

  beforeAll(() => {
    project = createTempProject();
  });

  afterAll(() => {
    project.cleanup();
  });

  it('Property: S <= C のときだけ読み取りが成功する', () => {
    fc.assert(
      fc.property(FileSizeArb, CeilingArb, (size, ceiling) => {
        const name = `sized-${counter++}.bin`;
        fs.writeFileSync(path.join(project.root, name), Buffer.alloc(size));
        const validator = mustCreate({ root: project.root, maxFileSize: ceiling });
        const result = validator.validatePath(name, 'read');
        if (size <= ceiling) {
          return E.isRight(result);
        }
        if (E.isRight(result)) return false;
        const error = result.left;
        return (
          error.code === 'SIZE_LIMIT_EXCEEDED' && error.actual === size && error.limit === ceiling
        );
      }),
      { numRuns: 50 }
    );
  });

  it('Property: 存在しないパスは上限によらずサイズ検査で失敗しない', () => {
    fc.assert(
      fc.property(SegmentsArb, CeilingArb, (segments, ceiling) => {
        const validator = mustCreate({ root: project.root, maxFileSize: ceiling });
        const raw = ['missing', ...segments].join('/');
        return E.isRight(validator.validatePath(raw, 'read'));
      }),
      { numRuns: 50 }
    );
  });
});
