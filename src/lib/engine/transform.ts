// ============================================================
// Geometry Transform — rotate a whole board, then move it
// ============================================================

import { produce } from 'immer';
import type { Draft } from 'immer';
import type {
  BoardDocument,
  BoardRotation,
  Orientation,
  PlainPrimitive,
  Point,
  PolygonPrimitive,
  WirePrimitive,
} from '@/types';
import { NM_PER_MM } from '@/constants';

export interface BoardPlacement {
  /** Counter-clockwise, about the board origin */
  rotation: BoardRotation;
  /** Translation applied after the rotation, in nanometres */
  offset: Point;
}

export const IDENTITY_PLACEMENT: BoardPlacement = { rotation: 0, offset: { x: 0, y: 0 } };

const ORIENTATION_RE = /^([MS]*)R(\d+)$/;

/** Convert a millimetre offset into board units. */
export function offsetFromMillimetres(x: number, y: number): Point {
  return { x: Math.round(x * NM_PER_MM), y: Math.round(y * NM_PER_MM) };
}

/** Exact right-angle rotation about the origin (swaps and negations only). */
export function rotatePoint(point: Point, rotation: BoardRotation): Point {
  const { x, y } = point;
  switch (rotation) {
    case 90:
      return { x: -y, y: x };
    case 180:
      return { x: -x, y: -y };
    case 270:
      return { x: y, y: -x };
    default:
      return { x, y };
  }
}

export function placePoint(point: Point, placement: BoardPlacement): Point {
  const rotated = rotatePoint(point, placement.rotation);
  // adding the offset also turns any -0 from the negation into 0
  return { x: rotated.x + placement.offset.x, y: rotated.y + placement.offset.y };
}

/**
 * Turn an orientation by the board rotation. Mirrored orientations turn the
 * opposite way. A plain `R0` result is dropped, since absent means `R0`.
 */
export function rotateOrientation(
  rot: Orientation | undefined,
  rotation: BoardRotation,
): Orientation | undefined {
  if (rotation === 0) return rot;

  const match = ORIENTATION_RE.exec(rot ?? 'R0');
  if (!match) {
    throw new Error(`Unsupported orientation ${rot}`);
  }
  const flags = match[1];
  const angle = Number(match[2]);
  const turned = flags.includes('M') ? angle - rotation : angle + rotation;
  const normalized = ((turned % 360) + 360) % 360;

  if (flags === '' && normalized === 0) return undefined;
  return `${flags}R${normalized}`;
}

// ---- In-place helpers (operate on immer drafts) ----

function movePoint(point: Draft<Point>, placement: BoardPlacement): void {
  const placed = placePoint(point, placement);
  point.x = placed.x;
  point.y = placed.y;
}

function setOrientation(target: { rot?: Orientation }, placement: BoardPlacement): void {
  const rot = rotateOrientation(target.rot, placement.rotation);
  if (rot === undefined) {
    delete target.rot;
  } else {
    target.rot = rot;
  }
}

function moveWire(wire: Draft<WirePrimitive>, placement: BoardPlacement): void {
  movePoint(wire.start, placement);
  movePoint(wire.end, placement);
}

function movePolygon(polygon: Draft<PolygonPrimitive>, placement: BoardPlacement): void {
  for (const vertex of polygon.vertices) movePoint(vertex.position, placement);
}

function movePrimitive(primitive: Draft<PlainPrimitive>, placement: BoardPlacement): void {
  switch (primitive.kind) {
    case 'wire':
      moveWire(primitive, placement);
      break;
    case 'polygon':
      movePolygon(primitive, placement);
      break;
    case 'text':
      movePoint(primitive.position, placement);
      setOrientation(primitive, placement);
      break;
    case 'dimension':
      for (const point of primitive.points) movePoint(point, placement);
      break;
    case 'circle':
      movePoint(primitive.center, placement);
      break;
    case 'rectangle':
    case 'frame':
      // both corners move; the rectangle stays axis-aligned
      movePoint(primitive.start, placement);
      movePoint(primitive.end, placement);
      break;
    case 'hole':
      movePoint(primitive.position, placement);
      break;
  }
}

/**
 * Produce a copy of `board` with every placed coordinate rotated about the
 * origin and then translated. Package-local library geometry follows its
 * element and is left as is. The input document is never mutated.
 */
export function transformBoard(board: BoardDocument, placement: BoardPlacement): BoardDocument {
  return produce(board, (draft) => {
    for (const primitive of draft.plain) movePrimitive(primitive, placement);

    for (const element of draft.elements) {
      movePoint(element.position, placement);
      setOrientation(element, placement);
      for (const attribute of element.attributes) {
        // only smashed attributes carry their own placement
        if (!attribute.position) continue;
        movePoint(attribute.position, placement);
        setOrientation(attribute, placement);
      }
    }

    for (const signal of draft.signals) {
      for (const wire of signal.wires) moveWire(wire, placement);
      for (const via of signal.vias) movePoint(via.position, placement);
      for (const polygon of signal.polygons) movePolygon(polygon, placement);
    }
  });
}
