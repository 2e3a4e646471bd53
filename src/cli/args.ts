// ============================================================
// CLI Arguments — output file, then per-input option groups
// ============================================================

import type { BoardRotation, Point } from '@/types';
import { BOARD_ROTATIONS } from '@/constants';
import { parseLength } from '@/lib/units';

export const USAGE = `Usage:
    panelmerge [--package-merge] [--quiet] output-file [in-file [--offx offset-x] [--offy offset-y] [--rotation rotation]]...

Offsets need a unit (mm, cm, mil, in), e.g. --offx 50mm.
Rotations are counter-clockwise: 0, 90, 180 or 270.
An output path ending in .brdz is written as a board archive, anything else as JSON.`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliInput {
  path: string;
  /** Nanometres */
  offset: Point;
  rotation: BoardRotation;
}

export interface CliOptions {
  help: boolean;
  quiet: boolean;
  packageMerge: boolean;
  output: string;
  inputs: CliInput[];
}

function parseOffset(value: string): number {
  const parsed = parseLength(value);
  if (!parsed) {
    throw new UsageError(`Can't parse ${value} as an offset value. Were units forgotten?`);
  }
  return parsed.nanometres;
}

function parseRotation(value: string): BoardRotation {
  const rotation = BOARD_ROTATIONS.find(r => String(r) === value);
  if (rotation === undefined) {
    throw new UsageError(`Can't parse ${value} as a rotation value. Supported rotations are 0, 90, 180, 270.`);
  }
  return rotation;
}

/** Parse `argv` without the node and script entries. */
export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { help: false, quiet: false, packageMerge: false, output: '', inputs: [] };

  let i = 0;
  // Global flags come before the output file
  for (; i < argv.length && argv[i].startsWith('-'); i++) {
    const flag = argv[i];
    if (flag === '--help' || flag === '-h') {
      options.help = true;
      return options;
    } else if (flag === '--quiet' || flag === '-q') {
      options.quiet = true;
    } else if (flag === '--package-merge') {
      options.packageMerge = true;
    } else {
      throw new UsageError(`Unsupported option ${flag}`);
    }
  }

  if (i >= argv.length) {
    throw new UsageError('Too few arguments specified. Expected an output file');
  }
  options.output = argv[i++];

  let current: CliInput | null = null;
  while (i < argv.length) {
    const arg = argv[i];
    if (!arg.startsWith('-')) {
      // Start a new input file
      current = { path: arg, offset: { x: 0, y: 0 }, rotation: 0 };
      options.inputs.push(current);
      i++;
      continue;
    }

    if (!current) {
      throw new UsageError(`Option ${arg} must follow an input file`);
    }
    const value = argv[i + 1];
    if (value === undefined) {
      throw new UsageError(`Too few arguments specified. Expected a value after ${arg}`);
    }

    if (arg === '--offx') {
      current.offset.x = parseOffset(value);
    } else if (arg === '--offy') {
      current.offset.y = parseOffset(value);
    } else if (arg === '--rotation') {
      current.rotation = parseRotation(value);
    } else {
      throw new UsageError(`Unsupported option ${arg}`);
    }
    i += 2;
  }

  if (options.inputs.length === 0) {
    throw new UsageError('No input files given');
  }
  return options;
}
