export {
  readBoardFile,
  parseBoardFile,
  unwrapBoardFile,
  serializeBoard,
  writeBoardFile,
  createBoardFile,
  formatForPath,
  BoardFileError,
} from './board-file';
export type { BoardFile, BoardFileFormat } from './board-file';
