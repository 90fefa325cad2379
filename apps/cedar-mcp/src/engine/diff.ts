/**
 * 行単位のunified diff生成
 *
 * 共通の先頭/末尾を除いた中間部をLCSで比較する。
 * 中間部が大きすぎる場合は全削除＋全追加として扱う。
 */

export type DiffOpKind = ' ' | '-' | '+';

export interface DiffOp {
  readonly kind: DiffOpKind;
  readonly text: string;
}

export const DEFAULT_CONTEXT_LINES = 3;

// 行は改行を含まないため、末尾改行のない最終行の印として使える
const NO_EOL = '\n';
const NO_EOL_MARKER = '\\ No newline at end of file';

// LCSテーブルのセル数上限
const MAX_LCS_CELLS = 4_000_000;

/** 末尾の改行1つは行区切りとみなす */
export function splitLines(content: string): string[] {
  if (content === '') return [];
  const body = content.endsWith('\n') ? content.slice(0, -1) : content;
  return body.split('\n');
}

function diffMiddle(a: readonly string[], b: readonly string[]): DiffOp[] {
  const removeAll = a.map((text): DiffOp => ({ kind: '-', text }));
  const addAll = b.map((text): DiffOp => ({ kind: '+', text }));
  if (a.length === 0 || b.length === 0 || a.length * b.length > MAX_LCS_CELLS) {
    return [...removeAll, ...addAll];
  }

  // lcs[i * width + j] = a[i..] と b[j..] のLCS長
  const width = b.length + 1;
  const lcs = new Uint32Array((a.length + 1) * width);
  for (let i = a.length - 1; i >= 0; i--) {
    for (let j = b.length - 1; j >= 0; j--) {
      lcs[i * width + j] =
        a[i] === b[j]
          ? lcs[(i + 1) * width + j + 1] + 1
          : Math.max(lcs[(i + 1) * width + j], lcs[i * width + j + 1]);
    }
  }

  const ops: DiffOp[] = [];
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    if (a[i] === b[j]) {
      ops.push({ kind: ' ', text: a[i] });
      i++;
      j++;
    } else if (lcs[(i + 1) * width + j] >= lcs[i * width + j + 1]) {
      ops.push({ kind: '-', text: a[i] });
      i++;
    } else {
      ops.push({ kind: '+', text: b[j] });
      j++;
    }
  }
  for (; i < a.length; i++) ops.push({ kind: '-', text: a[i] });
  for (; j < b.length; j++) ops.push({ kind: '+', text: b[j] });
  return ops;
}

export function diffLines(before: readonly string[], after: readonly string[]): DiffOp[] {
  let prefix = 0;
  while (prefix < before.length && prefix < after.length && before[prefix] === after[prefix]) {
    prefix++;
  }
  let suffix = 0;
  while (
    suffix < before.length - prefix &&
    suffix < after.length - prefix &&
    before[before.length - 1 - suffix] === after[after.length - 1 - suffix]
  ) {
    suffix++;
  }

  const equal = (text: string): DiffOp => ({ kind: ' ', text });
  return [
    ...before.slice(0, prefix).map(equal),
    ...diffMiddle(before.slice(prefix, before.length - suffix), after.slice(prefix, after.length - suffix)),
    ...before.slice(before.length - suffix).map(equal),
  ];
}

const range = (start: number, count: number): string =>
  count === 1 ? `${start}` : `${start},${count}`;

/**
 * 変更箇所を前後 `context` 行とともにhunkにまとめる
 * 変更がなければ空配列
 */
export function formatHunks(ops: readonly DiffOp[], context = DEFAULT_CONTEXT_LINES): string[] {
  // 各op位置での旧/新の行番号（1始まり）
  const oldAt: number[] = [];
  const newAt: number[] = [];
  let oldLine = 1;
  let newLine = 1;
  for (const op of ops) {
    oldAt.push(oldLine);
    newAt.push(newLine);
    if (op.kind !== '+') oldLine++;
    if (op.kind !== '-') newLine++;
  }

  const lines: string[] = [];
  let k = 0;
  while (k < ops.length) {
    if (ops[k].kind === ' ') {
      k++;
      continue;
    }

    const start = Math.max(0, k - context);
    let end = k;
    let j = k;
    while (j < ops.length) {
      if (ops[j].kind !== ' ') {
        end = j + 1;
        j++;
        continue;
      }
      let run = 0;
      while (j + run < ops.length && ops[j + run].kind === ' ') run++;
      if (j + run >= ops.length || run > 2 * context) break;
      j += run;
    }
    const stop = Math.min(ops.length, end + context);

    const slice = ops.slice(start, stop);
    const oldCount = slice.filter((op) => op.kind !== '+').length;
    const newCount = slice.filter((op) => op.kind !== '-').length;
    // 空範囲は直前の行番号で表す（unified diffの慣例）
    const oldStart = oldCount === 0 ? oldAt[start] - 1 : oldAt[start];
    const newStart = newCount === 0 ? newAt[start] - 1 : newAt[start];

    lines.push(`@@ -${range(oldStart, oldCount)} +${range(newStart, newCount)} @@`);
    for (const op of slice) {
      if (op.text.endsWith(NO_EOL)) {
        lines.push(`${op.kind}${op.text.slice(0, -NO_EOL.length)}`, NO_EOL_MARKER);
      } else {
        lines.push(`${op.kind}${op.text}`);
      }
    }
    k = stop;
  }
  return lines;
}

/** 末尾改行の有無も差分として現れるよう、改行のない最終行に印を付ける */
function diffInput(content: string): string[] {
  const lines = splitLines(content);
  if (content !== '' && !content.endsWith('\n')) {
    lines[lines.length - 1] += NO_EOL;
  }
  return lines;
}

/**
 * ファイル内容のunified diffを生成する
 * `null` は存在しないファイル（作成・削除）を表す
 */
export function unifiedDiff(
  displayPath: string,
  before: string | null,
  after: string | null,
  context = DEFAULT_CONTEXT_LINES
): string {
  const hunks = formatHunks(diffLines(diffInput(before ?? ''), diffInput(after ?? '')), context);
  if (hunks.length === 0) return '';

  const header = [
    before === null ? '--- /dev/null' : `--- a/${displayPath}`,
    after === null ? '+++ /dev/null' : `+++ b/${displayPath}`,
  ];
  return [...header, ...hunks].join('\n') + '\n';
}
