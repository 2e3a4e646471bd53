// ============================================================
// Panelmerge Constants
// ============================================================

import type { BoardRotation } from '@/types';

// Units (all board geometry is stored in integer nanometres)
export const NM_PER_MM = 1_000_000;
export const NM_PER_MIL = 25_400;
export const NM_PER_INCH = 25_400_000;

export const BOARD_ROTATIONS: readonly BoardRotation[] = [0, 90, 180, 270];

// Supported document schema majors. Documents below 6 lack the embedded
// libraries and design rule sets the merge compares; majors above 9 are
// unknown to the board schema.
export const MIN_SCHEMA_MAJOR = 6;
export const MAX_SCHEMA_MAJOR = 9;

// Layer numbers the target format can represent
export const MIN_LAYER_NUMBER = 1;
export const MAX_LAYER_NUMBER = 255;

// Placed attribute that carries an element's visible name label
export const NAME_ATTRIBUTE = 'NAME';
export const NAME_OVERRIDE_ATTRIBUTE = 'NAME1';

// Separator between a colliding name and its numeric suffix
export const RENAME_SEPARATOR = '_';

// Board files
export const BOARD_FILE_MAGIC = 'PANELMERGE_BOARD';
export const BOARD_FILE_VERSION = '1.0.0';
export const BOARD_ARCHIVE_EXTENSION = '.brdz';
export const BOARD_ARCHIVE_ENTRY = 'board.json';
export const BOARD_ARCHIVE_META = 'meta.json';

// Console tag for CLI output
export const LOG_TAG = '[panelmerge]';
