/**
 * ファイル単位の編集エンジン
 *
 * plan: 各コマンドのパスを検証し、メモリ上のオーバーレイに変更を積む（ディスクへは書かない）
 * commit: 計画に記録された正規パスにのみ書き込む
 *
 * 同一リクエスト内の後続コマンドは先行コマンドの結果を参照する。
 */
import { mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import * as E from 'fp-ts/Either';
import type { PathGuardError } from '@cedar-mcp/path-guard';
import { executionError, type AppError, type DomainError } from '../domain/errors.js';
import { splitLines } from './diff.js';
import { parseCommands } from './parser.js';
import type {
  ChangeAction,
  CommandOutcome,
  EditCommand,
  EditEngine,
  EditPlan,
  FileChange,
  PlanScope,
  UpdateAction,
} from './types.js';

export const ENGINE_NAME = 'cedarscript-file-engine';
export const ENGINE_VERSION = '0.1.0';

function errnoCode(e: unknown): string | undefined {
  return e instanceof Error && 'code' in e && typeof e.code === 'string' ? e.code : undefined;
}

function isAncestor(dir: string, candidate: string): boolean {
  const rel = path.relative(dir, candidate);
  return rel !== '' && !path.isAbsolute(rel) && rel !== '..' && !rel.startsWith(`..${path.sep}`);
}

/** 1ファイル分の追跡状態 */
interface Entry {
  readonly displayPath: string;
  readonly original: string | null;
  current: string | null;
  lastCommandIndex: number;
}

class Overlay {
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly scope: PlanScope) {}

  resolve(raw: string): E.Either<PathGuardError, string> {
    const { validator, baseDir, dryRun } = this.scope;
    // 相対パスはルート相対のまま検証する（エラーにホストの絶対パスを含めない）。
    // path.join は `..` を字句的に畳むため、基準ディレクトリは文字列連結で前置する
    const prefix = path.relative(validator.policy.root, baseDir);
    const candidate = path.isAbsolute(raw) || prefix === '' ? raw : `${prefix}${path.sep}${raw}`;
    const read = validator.validatePath(candidate, 'read');
    if (E.isLeft(read) || dryRun) return read;
    return validator.validatePath(candidate, 'write');
  }

  async load(
    canonical: string,
    target: string,
    commandIndex: number
  ): Promise<E.Either<DomainError, Entry>> {
    const existing = this.entries.get(canonical);
    if (existing) return E.right(existing);

    // 計画中のファイルとディレクトリが同じパスで衝突しないこと
    for (const [other, entry] of this.entries) {
      if (entry.current === null) continue;
      if (isAncestor(other, canonical)) {
        return E.left(executionError(`Parent path is not a directory: ${target}`, commandIndex));
      }
      if (isAncestor(canonical, other)) {
        return E.left(executionError(`Not a regular file: ${target}`, commandIndex));
      }
    }

    let original: string | null;
    try {
      const info = await stat(canonical);
      if (!info.isFile()) {
        return E.left(executionError(`Not a regular file: ${target}`, commandIndex));
      }
      original = await readFile(canonical, 'utf8');
    } catch (e) {
      const code = errnoCode(e);
      if (code === 'ENOENT') {
        original = null;
      } else if (code === 'ENOTDIR') {
        return E.left(executionError(`Parent path is not a directory: ${target}`, commandIndex));
      } else if (code !== undefined) {
        return E.left(executionError(`Failed to read ${target}: ${code}`, commandIndex, e));
      } else {
        throw e;
      }
    }

    const entry: Entry = {
      displayPath: path
        .relative(this.scope.validator.policy.root, canonical)
        .split(path.sep)
        .join('/'),
      original,
      current: original,
      lastCommandIndex: commandIndex,
    };
    this.entries.set(canonical, entry);
    return E.right(entry);
  }

  changes(): FileChange[] {
    const changes: FileChange[] = [];
    for (const [canonical, entry] of this.entries) {
      if (entry.original === entry.current) continue;
      const action: ChangeAction =
        entry.original === null ? 'create' : entry.current === null ? 'delete' : 'update';
      changes.push({
        path: canonical,
        displayPath: entry.displayPath,
        action,
        before: entry.original,
        after: entry.current,
        commandIndex: entry.lastCommandIndex,
      });
    }
    return changes;
  }
}

function joinLines(lines: readonly string[], trailingNewline: boolean): string {
  if (lines.length === 0) return '';
  return lines.join('\n') + (trailingNewline ? '\n' : '');
}

/**
 * UPDATE の行操作を適用する
 * マーカーは前後の空白を除いた行全体との一致で探す
 */
export function applyUpdateAction(
  current: string,
  action: UpdateAction,
  target: string,
  commandIndex: number
): E.Either<DomainError, string> {
  if (action.kind === 'replace_whole') return E.right(action.content);

  const lines = splitLines(current);
  const wanted = action.marker.trim();
  const hits = lines.flatMap((line, i) => (line.trim() === wanted ? [i] : []));
  if (hits.length === 0) {
    return E.left(
      executionError(`Marker not found in ${target}: '${action.marker}'`, commandIndex)
    );
  }
  if (hits.length > 1) {
    return E.left(
      executionError(
        `Marker is ambiguous in ${target}: '${action.marker}' matches ${hits.length} lines`,
        commandIndex
      )
    );
  }

  const at = hits[0];
  const next = [...lines];
  switch (action.kind) {
    case 'delete_line':
      next.splice(at, 1);
      break;
    case 'replace_line':
      next.splice(at, 1, ...splitLines(action.content));
      break;
    case 'insert_line':
      next.splice(action.position === 'before' ? at : at + 1, 0, ...splitLines(action.content));
      break;
  }
  return E.right(joinLines(next, current.endsWith('\n')));
}

async function planCommand(
  overlay: Overlay,
  command: EditCommand,
  index: number
): Promise<E.Either<AppError, CommandOutcome>> {
  const target = overlay.resolve(command.target);
  if (E.isLeft(target)) return target;

  // MOVE は移動先も読み込み前に検証する
  let destination: string | undefined;
  if (command.type === 'MoveFile') {
    const resolved = overlay.resolve(command.destination);
    if (E.isLeft(resolved)) return resolved;
    destination = resolved.right;
  }

  const loaded = await overlay.load(target.right, command.target, index);
  if (E.isLeft(loaded)) return loaded;
  const entry = loaded.right;
  entry.lastCommandIndex = index;

  const outcome = (summary: string): E.Either<AppError, CommandOutcome> =>
    E.right({ commandIndex: index, type: command.type, target: entry.displayPath, summary });

  switch (command.type) {
    case 'CreateFile':
      if (entry.current !== null) {
        return E.left(executionError(`File already exists: ${command.target}`, index));
      }
      entry.current = command.content;
      return outcome(`Created ${entry.displayPath}`);

    case 'UpdateFile': {
      if (entry.current === null) {
        return E.left(executionError(`File not found: ${command.target}`, index));
      }
      const updated = applyUpdateAction(entry.current, command.action, command.target, index);
      if (E.isLeft(updated)) return updated;
      entry.current = updated.right;
      return outcome(`Updated ${entry.displayPath} (${command.action.kind})`);
    }

    case 'DeleteFile':
      if (entry.current === null) {
        return E.left(executionError(`File not found: ${command.target}`, index));
      }
      entry.current = null;
      return outcome(`Deleted ${entry.displayPath}`);

    case 'MoveFile': {
      if (entry.current === null) {
        return E.left(executionError(`File not found: ${command.target}`, index));
      }
      if (destination === undefined || destination === target.right) {
        return E.left(
          executionError(`Source and destination are the same file: ${command.target}`, index)
        );
      }
      const dest = await overlay.load(destination, command.destination, index);
      if (E.isLeft(dest)) return dest;
      if (dest.right.current !== null) {
        return E.left(
          executionError(`Destination already exists: ${command.destination}`, index)
        );
      }
      dest.right.current = entry.current;
      dest.right.lastCommandIndex = index;
      entry.current = null;
      return outcome(`Moved ${entry.displayPath} to ${dest.right.displayPath}`);
    }
  }
}

export async function planCommands(
  commands: readonly EditCommand[],
  scope: PlanScope
): Promise<E.Either<AppError, EditPlan>> {
  const overlay = new Overlay(scope);
  const outcomes: CommandOutcome[] = [];

  for (const [index, command] of commands.entries()) {
    const result = await planCommand(overlay, command, index);
    if (E.isLeft(result)) return result;
    outcomes.push(result.right);
  }

  return E.right({ dryRun: scope.dryRun, changes: overlay.changes(), outcomes });
}

/**
 * 計画済みの変更をディスクへ反映する
 * 作成・更新をすべて書き込んでから削除する（途中で失敗しても MOVE 元は残る）。
 * 親ディレクトリは必要に応じて作成する
 */
export async function commitPlan(plan: EditPlan): Promise<E.Either<AppError, readonly CommandOutcome[]>> {
  if (plan.dryRun) {
    return E.left(executionError('Cannot commit a dry-run plan', 0));
  }

  const ordered = [
    ...plan.changes.filter((c) => c.after !== null),
    ...plan.changes.filter((c) => c.after === null),
  ];
  for (const change of ordered) {
    try {
      if (change.after === null) {
        await rm(change.path, { force: true });
      } else {
        await mkdir(path.dirname(change.path), { recursive: true });
        await writeFile(change.path, change.after, 'utf8');
      }
    } catch (e) {
      const code = errnoCode(e);
      if (code === undefined) throw e;
      return E.left(
        executionError(`Failed to write ${change.displayPath}: ${code}`, change.commandIndex, e)
      );
    }
  }
  return E.right(plan.outcomes);
}

export function createFileEditEngine(): EditEngine {
  return {
    name: ENGINE_NAME,
    version: ENGINE_VERSION,
    features: {
      commands: ['UPDATE', 'CREATE', 'DELETE', 'MOVE'],
      actions: ['REPLACE WHOLE', 'REPLACE LINE', 'DELETE LINE', 'INSERT BEFORE LINE', 'INSERT AFTER LINE'],
      dryRun: true,
    },
    parse: parseCommands,
    plan: planCommands,
    commit: commitPlan,
  };
}
