/**
 * コマンドライン引数の解析
 *
 * `--opt value` と `--opt=value` の両方を受け付ける。
 * 未知のオプション・値の欠落・不正な値はエラー文字列で返す。
 */
import * as E from 'fp-ts/Either';
import { LOG_FORMATS, LOG_LEVELS, type LogFormat, type LogLevel } from './env.js';

export interface CliOptions {
  root?: string;
  readOnly?: boolean;
  maxFileSize?: number;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
  policy?: string;
  help?: boolean;
  version?: boolean;
}

export const USAGE = `
Usage: cedar-mcp [options]

MCP stdio server for CEDARScript-style file edits, confined to a root directory.

Options:
  --root <dir>             Root directory for all file operations (default: $CEDARSCRIPT_ROOT or cwd)
  --read-only              Reject every write operation
  --max-file-size <bytes>  Maximum size of a file read (default: 10485760)
  --log-level <level>      DEBUG, INFO, WARNING or ERROR (default: INFO)
  --log-format <format>    text or json (default: text)
  --policy <file>          YAML policy file (read_only, max_file_size, denylist)
  -h, --help               Show this help
  -v, --version            Show version

Environment:
  CEDARSCRIPT_ROOT, CEDARSCRIPT_READ_ONLY, CEDARSCRIPT_MAX_FILE_SIZE,
  CEDARSCRIPT_LOG_LEVEL, CEDARSCRIPT_LOG_FORMAT, CEDARSCRIPT_POLICY, AUDIT_LOG_PATH
`;

const isOneOf = <T extends string>(values: readonly T[], value: string): value is T =>
  values.some((v) => v === value);

export function parseCliArgs(argv: readonly string[]): E.Either<string, CliOptions> {
  const options: CliOptions = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);

    // 値を取るオプション: インライン値がなければ次の引数を消費する
    const takeValue = (): E.Either<string, string> => {
      if (inline !== undefined) return E.right(inline);
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('-')) {
        return E.left(`Missing value for ${name}`);
      }
      i++;
      return E.right(next);
    };

    switch (name) {
      case '--root':
      case '--policy': {
        const value = takeValue();
        if (E.isLeft(value)) return value;
        if (value.right === '') return E.left(`Empty value for ${name}`);
        if (name === '--root') options.root = value.right;
        else options.policy = value.right;
        break;
      }
      case '--max-file-size': {
        const value = takeValue();
        if (E.isLeft(value)) return value;
        const size = Number(value.right);
        if (!/^\d+$/.test(value.right) || !Number.isSafeInteger(size) || size <= 0) {
          return E.left(`Invalid value for --max-file-size: ${value.right}`);
        }
        options.maxFileSize = size;
        break;
      }
      case '--log-level': {
        const value = takeValue();
        if (E.isLeft(value)) return value;
        const level = value.right.toUpperCase();
        if (!isOneOf(LOG_LEVELS, level)) {
          return E.left(`Invalid value for --log-level: ${value.right}`);
        }
        options.logLevel = level;
        break;
      }
      case '--log-format': {
        const value = takeValue();
        if (E.isLeft(value)) return value;
        const format = value.right.toLowerCase();
        if (!isOneOf(LOG_FORMATS, format)) {
          return E.left(`Invalid value for --log-format: ${value.right}`);
        }
        options.logFormat = format;
        break;
      }
      case '--read-only':
        if (inline !== undefined) return E.left('--read-only does not take a value');
        options.readOnly = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--version':
      case '-v':
        options.version = true;
        break;
      default:
        return E.left(`Unknown option: ${arg}`);
    }
  }

  return E.right(options);
}
