import { point, type Point, type Rgb, type Seed, type TriangleSizing } from '@chaosgame/core';

export const DEFAULT_QUALITY = 4_000_000;
export const DEFAULT_OUTPUT_DIRECTORY = './';

export interface RenderOptions {
  width: number;
  height: number;
  quality: number;             // iteration count
  outputDirectory: string;
  triangle: TriangleSizing;
  seed?: Seed;
  color?: Rgb;
  background?: Rgb;
  json: boolean;
  quiet: boolean;
}

export type Command =
  | { kind: 'render'; options: RenderOptions }
  | { kind: 'help' }
  | { kind: 'version' };

export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

export function usage(): string {
  return `Usage:
  sierpinski [render] --size <n> [options]
  sierpinski [render] --width <w> --height <h> [options]

Canvas:
  -s, --size <n>                 Square canvas of n x n pixels
  --width <n>, --height <n>      Canvas width and height in pixels

Rendering:
  -q, --quality <n>              Number of chaos-game iterations (default: ${DEFAULT_QUALITY})
  --side <n>                     Equilateral triangle side (default: min(width, height))
  --points "x1,y1 x2,y2 x3,y3"   Explicit triangle vertices
  --seed <value>                 RNG seed for a reproducible image (default: random)
  --color <#rrggbb>              Plotted pixel color (default: #ffffff)
  --background <#rrggbb>         Background color (default: #000000)

Output:
  -d, --output-directory <dir>   Directory the PNG is written to (default: ${DEFAULT_OUTPUT_DIRECTORY})
  --json                         Print a JSON summary instead of the step log
  --quiet                        Do not draw the progress bar
  -h, --help                     Show this help
  -V, --version                  Print the version`;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) throw new ArgumentError(`Missing value for ${flag}`);
  return value;
}

export function parseCount(flag: string, value: string, allowZero = false): number {
  const n = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (!Number.isSafeInteger(n) || (!allowZero && n === 0)) {
    throw new ArgumentError(`${flag} expects a ${allowZero ? 'non-negative' : 'positive'} integer, got "${value}"`);
  }
  return n;
}

function parseNumber(flag: string, value: string): number {
  const n = value.trim() === '' ? NaN : Number(value);
  if (!Number.isFinite(n)) throw new ArgumentError(`${flag} expects a number, got "${value}"`);
  return n;
}

/** "x1,y1 x2,y2 x3,y3" */
export function parsePoints(value: string): [Point, Point, Point] {
  const parts = value.trim().split(/\s+/);
  if (parts.length !== 3) throw new ArgumentError(`--points expects three "x,y" pairs, got "${value}"`);
  const pts = parts.map(part => {
    const xy = part.split(',');
    if (xy.length !== 2) throw new ArgumentError(`--points expects "x,y", got "${part}"`);
    return point(parseNumber('--points', xy[0] ?? ''), parseNumber('--points', xy[1] ?? ''));
  });
  const [a, b, c] = pts;
  if (!a || !b || !c) throw new ArgumentError(`--points expects three "x,y" pairs, got "${value}"`);
  return [a, b, c];
}

export function parseColor(flag: string, value: string): Rgb {
  const m = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(value);
  if (!m) throw new ArgumentError(`${flag} expects a color like #ff8800, got "${value}"`);
  return [parseInt(m[1] ?? '0', 16), parseInt(m[2] ?? '0', 16), parseInt(m[3] ?? '0', 16)];
}

export function parseSeed(value: string): Seed {
  return /^-?\d+$/.test(value) ? parseInt(value, 10) : value;
}

export function parseArgs(argv: string[]): Command {
  const args = argv[0] === 'render' ? argv.slice(1) : argv;

  let size: number | undefined;
  let width: number | undefined;
  let height: number | undefined;
  let triangle: TriangleSizing = { kind: 'fit' };
  const options: Omit<RenderOptions, 'width' | 'height' | 'triangle'> = {
    quality: DEFAULT_QUALITY,
    outputDirectory: DEFAULT_OUTPUT_DIRECTORY,
    json: false,
    quiet: false
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i] ?? '';
    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-V':
      case '--version':
        return { kind: 'version' };
      case '-s':
      case '--size':
        size = parseCount(arg, requireValue(arg, args[++i]));
        break;
      case '--width':
        width = parseCount(arg, requireValue(arg, args[++i]));
        break;
      case '--height':
        height = parseCount(arg, requireValue(arg, args[++i]));
        break;
      case '-q':
      case '--quality':
        options.quality = parseCount(arg, requireValue(arg, args[++i]), true);
        break;
      case '-d':
      case '--output-directory':
        options.outputDirectory = requireValue(arg, args[++i]);
        break;
      case '--side':
        triangle = { kind: 'side', length: parseNumber(arg, requireValue(arg, args[++i])) };
        break;
      case '--points': {
        const [a, b, c] = parsePoints(requireValue(arg, args[++i]));
        triangle = { kind: 'points', a, b, c };
        break;
      }
      case '--seed':
        options.seed = parseSeed(requireValue(arg, args[++i]));
        break;
      case '--color':
        options.color = parseColor(arg, requireValue(arg, args[++i]));
        break;
      case '--background':
        options.background = parseColor(arg, requireValue(arg, args[++i]));
        break;
      case '--json':
        options.json = true;
        break;
      case '--quiet':
        options.quiet = true;
        break;
      default:
        throw new ArgumentError(arg.startsWith('-') ? `Unknown option: ${arg}` : `Unexpected argument: ${arg}`);
    }
    i++;
  }

  width ??= size;
  height ??= size;
  if (width === undefined || height === undefined) {
    throw new ArgumentError('Canvas size is required: pass --size, or both --width and --height');
  }
  return { kind: 'render', options: { ...options, triangle, width, height } };
}
