import minimist from 'minimist';
import path from 'path';
import { type EffectName, isEffectName } from '../client/effects';

export const OUTPUT_FORMATS = ['png', 'jpeg', 'webp'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface CliOptions {
  effect: EffectName;
  input: string;
  output: string;
  hat: boolean;
  timeout?: number;
  format?: OutputFormat;
  logDir?: string;
}

export type ParseResult = { ok: true; options: CliOptions } | { ok: false; error: string } | { ok: false; help: true };

export const USAGE = `usage: photo-effects <fatify|clownify> <input> [options]

  -o, --out <file>      output path (default: <input>-<effect>.<ext>)
      --hat             clownify: add the clown hat
      --timeout <ms>    per-request timeout
      --format <fmt>    re-encode the result as png, jpeg or webp
      --log-dir <dir>   where to write the ndjson log (default: ./logs)
  -h, --help            show this help`;

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}

export function defaultOutputPath(input: string, effect: EffectName, format?: OutputFormat): string {
  const parsed = path.parse(input);
  const ext = format ? `.${format === 'jpeg' ? 'jpg' : format}` : parsed.ext || '.jpg';
  return path.join(parsed.dir, `${parsed.name}-${effect}${ext}`);
}

export function parseCliArgs(argv: string[]): ParseResult {
  const args = minimist(argv, {
    string: ['out', 'timeout', 'format', 'log-dir'],
    boolean: ['hat', 'help'],
    alias: { o: 'out', h: 'help' },
    default: { hat: false },
  });

  if (args.help) return { ok: false, help: true };

  const [effect, input] = args._.map(String);
  if (!effect || !input) return { ok: false, error: 'an effect and an input file are required' };
  if (!isEffectName(effect)) return { ok: false, error: `unknown effect: ${effect}` };

  let timeout: number | undefined;
  if (args.timeout !== undefined && args.timeout !== '') {
    timeout = Number(args.timeout);
    if (!Number.isInteger(timeout) || timeout < 0) return { ok: false, error: `invalid timeout: ${args.timeout}` };
  }

  let format: OutputFormat | undefined;
  if (args.format !== undefined && args.format !== '') {
    const f = String(args.format).toLowerCase();
    if (!isOutputFormat(f)) return { ok: false, error: `unsupported format: ${args.format}` };
    format = f;
  }

  if (args.hat && effect !== 'clownify') return { ok: false, error: '--hat only applies to clownify' };

  return {
    ok: true,
    options: {
      effect,
      input,
      output: args.out ? String(args.out) : defaultOutputPath(input, effect, format),
      hat: Boolean(args.hat),
      timeout,
      format,
      logDir: args['log-dir'] ? String(args['log-dir']) : undefined,
    },
  };
}
