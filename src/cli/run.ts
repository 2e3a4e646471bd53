// ============================================================
// CLI Runner — load inputs, merge, write the panel
// ============================================================

import { LOG_TAG } from '@/constants';
import { MergeError, mergeBoards } from '@/lib/engine';
import type { MergeInput } from '@/lib/engine';
import { BoardFileError, readBoardFile, writeBoardFile } from '@/lib/export';
import { formatLength } from '@/lib/units';
import { USAGE, UsageError, parseArgs } from './args';
import type { CliOptions } from './args';

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_FAILED = 2;

/**
 * Run the merge command. Every input is read before merging and the output
 * is only written after the whole merge succeeded.
 */
export async function run(argv: readonly string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(err.message);
    console.error(USAGE);
    return EXIT_USAGE;
  }

  if (options.help) {
    console.log(USAGE);
    return EXIT_OK;
  }

  try {
    const inputs: MergeInput[] = [];
    for (const input of options.inputs) {
      inputs.push({
        source: input.path,
        document: await readBoardFile(input.path),
        offset: input.offset,
        rotation: input.rotation,
      });
    }

    const result = mergeBoards(inputs, {
      libraryMatching: options.packageMerge ? 'package' : 'library',
    });

    if (!options.quiet) {
      for (const d of result.diagnostics) {
        if (d.severity === 'warning') console.warn(`${LOG_TAG} ${d.source}: Warning: ${d.message}`);
      }
      for (const input of options.inputs) {
        console.log(
          `${LOG_TAG} ${input.path}: rotated ${input.rotation}°, ` +
          `moved by (${formatLength(input.offset.x)}, ${formatLength(input.offset.y)})`,
        );
      }
      if (result.renames.length > 0) {
        console.log(`${LOG_TAG} ${result.renames.length} name(s) changed to keep names unique`);
      }
    }

    await writeBoardFile(options.output, result.document);
    if (!options.quiet) console.log(`${LOG_TAG} Panel written to ${options.output}`);
    return EXIT_OK;
  } catch (err) {
    if (err instanceof MergeError) {
      console.error(`${LOG_TAG} Error: ${err.describe()}`);
      return EXIT_FAILED;
    }
    if (err instanceof BoardFileError) {
      console.error(`${LOG_TAG} ${err.path}: Error: ${err.message}`);
      return EXIT_FAILED;
    }
    throw err;
  }
}
