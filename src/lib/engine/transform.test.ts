import { describe, it, expect } from 'vitest';
import type { BoardDocument, BoardRotation } from '@/types';
import { MM, makeBoard, makeElement } from '@/test/fixtures';
import {
  IDENTITY_PLACEMENT,
  offsetFromMillimetres,
  rotateOrientation,
  rotatePoint,
  transformBoard,
} from './transform';

function boardWithEverything(): BoardDocument {
  return makeBoard({
    plain: [
      { kind: 'wire', layer: 20, start: { x: 0, y: 0 }, end: { x: 40 * MM, y: 0 }, width: 0, curve: 90 },
      { kind: 'text', layer: 25, text: 'REV A', position: { x: 5 * MM, y: 7 * MM }, size: MM, rot: 'R90' },
      { kind: 'dimension', layer: 47, points: [{ x: 0, y: 0 }, { x: 40 * MM, y: 0 }, { x: 20 * MM, y: -3 * MM }] },
      { kind: 'circle', layer: 21, center: { x: 2 * MM, y: 3 * MM }, radius: MM, width: 0 },
      { kind: 'rectangle', layer: 21, start: { x: MM, y: MM }, end: { x: 3 * MM, y: 2 * MM } },
      { kind: 'frame', layer: 94, start: { x: 0, y: 0 }, end: { x: 50 * MM, y: 30 * MM }, columns: 4, rows: 3 },
      { kind: 'hole', position: { x: 3 * MM, y: 3 * MM }, drill: 3_200_000 },
      {
        kind: 'polygon',
        layer: 1,
        width: 0,
        vertices: [{ position: { x: 0, y: 0 } }, { position: { x: 4 * MM, y: 0 }, curve: -90 }, { position: { x: 4 * MM, y: 4 * MM } }],
      },
    ],
    elements: [
      makeElement('U1', {
        smashed: true,
        attributes: [
          { name: 'NAME', position: { x: 11 * MM, y: 6 * MM }, layer: 25, size: MM },
          { name: 'VALUE', value: '10k' },
        ],
      }),
      makeElement('U2', { position: { x: 20 * MM, y: 5 * MM }, rot: 'R90' }),
      makeElement('U3', { position: { x: 30 * MM, y: 5 * MM }, rot: 'MR0' }),
    ],
  });
}

describe('rotatePoint', () => {
  it('rotates counter-clockwise by right angles', () => {
    expect(rotatePoint({ x: 3, y: 4 }, 0)).toEqual({ x: 3, y: 4 });
    expect(rotatePoint({ x: 3, y: 4 }, 90)).toEqual({ x: -4, y: 3 });
    expect(rotatePoint({ x: 3, y: 4 }, 180)).toEqual({ x: -3, y: -4 });
    expect(rotatePoint({ x: 3, y: 4 }, 270)).toEqual({ x: 4, y: -3 });
  });
});

describe('offsetFromMillimetres', () => {
  it('converts with the exact nanometre factor', () => {
    expect(offsetFromMillimetres(50, -1.5)).toEqual({ x: 50_000_000, y: -1_500_000 });
  });
});

describe('rotateOrientation', () => {
  it('treats an absent orientation as R0', () => {
    expect(rotateOrientation(undefined, 90)).toBe('R90');
  });

  it('drops a plain R0 result', () => {
    expect(rotateOrientation('R270', 90)).toBeUndefined();
  });

  it('turns mirrored orientations the opposite way', () => {
    expect(rotateOrientation('MR90', 90)).toBe('MR0');
    expect(rotateOrientation('MR0', 90)).toBe('MR270');
  });

  it('keeps spin flags', () => {
    expect(rotateOrientation('SR180', 180)).toBe('SR0');
  });

  it('leaves orientations untouched for rotation 0', () => {
    expect(rotateOrientation('R0', 0)).toBe('R0');
    expect(rotateOrientation(undefined, 0)).toBeUndefined();
  });

  it('rejects malformed orientations', () => {
    expect(() => rotateOrientation('sideways', 90)).toThrow('Unsupported orientation sideways');
  });
});

describe('transformBoard', () => {
  it('returns a structurally equal board for the identity placement', () => {
    const board = boardWithEverything();
    expect(transformBoard(board, IDENTITY_PLACEMENT)).toEqual(boardWithEverything());
  });

  it('equals the identity after four quarter turns', () => {
    const board = boardWithEverything();
    let turned = board;
    for (let i = 0; i < 4; i++) {
      turned = transformBoard(turned, { rotation: 90, offset: { x: 0, y: 0 } });
    }
    expect(turned).toEqual(boardWithEverything());
  });

  it('rotates first and then moves', () => {
    const board = makeBoard();
    const moved = transformBoard(board, { rotation: 90, offset: offsetFromMillimetres(50, 0) });

    // (10mm, 5mm) -> (-5mm, 10mm) -> (45mm, 10mm)
    expect(moved.elements[0].position).toEqual({ x: 45 * MM, y: 10 * MM });
    expect(moved.elements[0].rot).toBe('R90');
    expect(moved.signals[0].wires[0].start).toEqual({ x: 45 * MM, y: 9 * MM });
    expect(moved.signals[0].wires[0].end).toEqual({ x: 45 * MM, y: 2 * MM });
    expect(moved.signals[0].vias[0].position).toEqual({ x: 45 * MM, y: 2 * MM });
    expect(moved.plain[0]).toEqual({
      kind: 'wire', layer: 20, start: { x: 50 * MM, y: 0 }, end: { x: 50 * MM, y: 40 * MM }, width: 0,
    });
  });

  it('moves every kind of coordinate', () => {
    const moved = transformBoard(boardWithEverything(), { rotation: 180, offset: { x: 100 * MM, y: 100 * MM } });

    expect(moved.plain[1]).toMatchObject({ position: { x: 95 * MM, y: 93 * MM }, rot: 'R270' });
    expect(moved.plain[2]).toMatchObject({
      points: [{ x: 100 * MM, y: 100 * MM }, { x: 60 * MM, y: 100 * MM }, { x: 80 * MM, y: 103 * MM }],
    });
    expect(moved.plain[3]).toMatchObject({ center: { x: 98 * MM, y: 97 * MM } });
    expect(moved.plain[4]).toMatchObject({ start: { x: 99 * MM, y: 99 * MM }, end: { x: 97 * MM, y: 98 * MM } });
    expect(moved.plain[6]).toMatchObject({ position: { x: 97 * MM, y: 97 * MM } });
    expect(moved.plain[7]).toMatchObject({
      vertices: [
        { position: { x: 100 * MM, y: 100 * MM } },
        { position: { x: 96 * MM, y: 100 * MM }, curve: -90 },
        { position: { x: 96 * MM, y: 96 * MM } },
      ],
    });
    expect(moved.elements[2].rot).toBe('MR180');
  });

  it('moves smashed attributes with their element and leaves the others alone', () => {
    const moved = transformBoard(boardWithEverything(), { rotation: 90, offset: { x: 0, y: 0 } });
    const [name, value] = moved.elements[0].attributes;

    expect(name).toEqual({ name: 'NAME', position: { x: -6 * MM, y: 11 * MM }, layer: 25, size: MM, rot: 'R90' });
    expect(value).toEqual({ name: 'VALUE', value: '10k' });
  });

  it('leaves package-local library geometry alone', () => {
    const board = makeBoard();
    const moved = transformBoard(board, { rotation: 270, offset: { x: MM, y: MM } });
    expect(moved.libraries).toBe(board.libraries);
  });

  it('does not mutate its input', () => {
    const board = boardWithEverything();
    const before = structuredClone(board);
    transformBoard(board, { rotation: 90, offset: { x: 7 * MM, y: -3 * MM } });
    expect(board).toEqual(before);
  });

  it.each<BoardRotation>([0, 90, 180, 270])('keeps integer coordinates for %i degrees', (rotation) => {
    const moved = transformBoard(boardWithEverything(), { rotation, offset: offsetFromMillimetres(12.5, 0.25) });
    for (const element of moved.elements) {
      expect(Number.isInteger(element.position.x)).toBe(true);
      expect(Number.isInteger(element.position.y)).toBe(true);
    }
  });
});
