/**
 * テスト用の一時プロジェクト
 */
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

export interface TempProject {
  /** 正規化済み（realpath）のルート */
  root: string;
  /** ルートと同じ親を持つ、ルート外のディレクトリ */
  outside: string;
  cleanup: () => void;
}

export function createTempProject(): TempProject {
  const parent = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'path-guard-test-')));
  // 英大文字を含む名前にして、arbitrariesが生成するセグメントと衝突させない
  const root = path.join(parent, 'Project');
  const outside = path.join(parent, 'Outside');
  fs.mkdirSync(root);
  fs.mkdirSync(outside);

  fs.writeFileSync(path.join(root, 'myfile.py'), 'import sys\n\ndef calculate(x):\n    return x + 1\n');
  fs.writeFileSync(path.join(root, 'README.md'), '# Test Project\n');
  fs.mkdirSync(path.join(root, 'src'));
  fs.writeFileSync(path.join(root, 'src', 'utils.py'), 'def helper():\n    pass\n');
  fs.writeFileSync(path.join(outside, 'secret.txt'), 'outside\n');

  return {
    root,
    outside,
    cleanup: () => fs.rmSync(parent, { recursive: true, force: true }),
  };
}
