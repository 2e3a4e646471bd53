// ============================================================
// Board Files — JSON boards and ZIP board archives (.brdz)
// ============================================================

import { readFile, writeFile } from 'node:fs/promises';
import JSZip from 'jszip';
import type { BoardDocument } from '@/types';
import {
  BOARD_ARCHIVE_ENTRY,
  BOARD_ARCHIVE_EXTENSION,
  BOARD_ARCHIVE_META,
  BOARD_FILE_MAGIC,
  BOARD_FILE_VERSION,
} from '@/constants';

export interface BoardFile {
  magic: string;
  version: string;
  createdAt: string;
  updatedAt: string;
  board: BoardDocument;
}

export type BoardFileFormat = 'json' | 'archive';

export class BoardFileError extends Error {
  constructor(
    readonly path: string,
    message: string,
  ) {
    super(message);
    this.name = 'BoardFileError';
  }
}

const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeCause(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isZip(bytes: Uint8Array): boolean {
  return ZIP_SIGNATURE.every((b, i) => bytes[i] === b);
}

export function formatForPath(path: string): BoardFileFormat {
  return path.toLowerCase().endsWith(BOARD_ARCHIVE_EXTENSION) ? 'archive' : 'json';
}

function parseJson(text: string, path: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new BoardFileError(path, `Invalid board file: ${describeCause(err)}`);
  }
}

/**
 * Unwrap a board file envelope. A bare document (no `magic`) is accepted
 * as is. The board itself is not validated here; the merge gate does that.
 */
export function unwrapBoardFile(parsed: unknown, path: string): unknown {
  if (!isRecord(parsed)) {
    throw new BoardFileError(path, 'Invalid board file: expected a JSON object');
  }
  if (!('magic' in parsed)) return parsed;
  if (parsed.magic !== BOARD_FILE_MAGIC) {
    throw new BoardFileError(path, 'Invalid board file: wrong format');
  }
  if (!('board' in parsed)) {
    throw new BoardFileError(path, 'Invalid board file: board missing');
  }
  return parsed.board;
}

/** Parse the bytes of a JSON board or a board archive. */
export async function parseBoardFile(bytes: Uint8Array, path = '(memory)'): Promise<unknown> {
  if (!isZip(bytes)) {
    return unwrapBoardFile(parseJson(Buffer.from(bytes).toString('utf-8'), path), path);
  }

  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(bytes);
  } catch (err) {
    throw new BoardFileError(path, `Invalid board archive: ${describeCause(err)}`);
  }
  const entry = zip.file(BOARD_ARCHIVE_ENTRY);
  if (!entry) {
    throw new BoardFileError(path, `Invalid board archive: ${BOARD_ARCHIVE_ENTRY} not found`);
  }

  let content: string;
  try {
    content = await entry.async('string');
  } catch (err) {
    throw new BoardFileError(path, `Invalid board archive: ${describeCause(err)}`);
  }
  return unwrapBoardFile(parseJson(content, path), path);
}

export async function readBoardFile(path: string): Promise<unknown> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (err) {
    throw new BoardFileError(path, `Input file ${path} not found or unreadable (${describeCause(err)})`);
  }
  return parseBoardFile(bytes, path);
}

export function createBoardFile(board: BoardDocument, now = new Date()): BoardFile {
  const timestamp = now.toISOString();
  return {
    magic: BOARD_FILE_MAGIC,
    version: BOARD_FILE_VERSION,
    createdAt: timestamp,
    updatedAt: timestamp,
    board,
  };
}

export async function serializeBoard(
  board: BoardDocument,
  format: BoardFileFormat,
  now = new Date(),
): Promise<Buffer> {
  const json = JSON.stringify(createBoardFile(board, now), null, 2);
  if (format === 'json') return Buffer.from(`${json}\n`, 'utf-8');

  const zip = new JSZip();
  zip.file(BOARD_ARCHIVE_ENTRY, json);

  // Summary for tools that only list archives
  zip.file(BOARD_ARCHIVE_META, JSON.stringify({
    version: BOARD_FILE_VERSION,
    schemaVersion: board.version,
    libraries: board.libraries.length,
    elements: board.elements.length,
    signals: board.signals.length,
    exportDate: now.toISOString(),
  }, null, 2));

  return zip.generateAsync({
    type: 'nodebuffer',
    compression: 'DEFLATE',
    compressionOptions: { level: 6 },
  });
}

/** Write `board` to `path`; the extension picks JSON or archive. */
export async function writeBoardFile(path: string, board: BoardDocument): Promise<void> {
  const bytes = await serializeBoard(board, formatForPath(path));
  await writeFile(path, bytes);
}
