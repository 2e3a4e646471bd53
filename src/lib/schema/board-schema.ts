// ============================================================
// Board Schema — the supported subset of the document format
// ============================================================

import { z } from 'zod';
import { MAX_LAYER_NUMBER, MAX_SCHEMA_MAJOR, MIN_LAYER_NUMBER, MIN_SCHEMA_MAJOR } from '@/constants';

// Every object is strict: a property outside the subset is an unsupported
// feature, never something to drop silently.

const SCHEMA_VERSION_RE = /^(\d+)\.(\d+)(?:\.(\d+))?$/;
const ORIENTATION_RE = /^(?:M?S?|S?M?)R(\d{1,3})$/;

export function isSupportedSchemaVersion(version: string): boolean {
  const match = SCHEMA_VERSION_RE.exec(version);
  if (!match) return false;
  const major = Number(match[1]);
  return major >= MIN_SCHEMA_MAJOR && major <= MAX_SCHEMA_MAJOR;
}

export function isSupportedOrientation(rot: string): boolean {
  const match = ORIENTATION_RE.exec(rot);
  return match !== null && Number(match[1]) < 360;
}

// ---- Scalars ----

const coordinate = z.number().int();
const length = z.number().int().nonnegative();
const layerNumber = z.number().int().min(MIN_LAYER_NUMBER).max(MAX_LAYER_NUMBER);
const curve = z.number().gt(-360).lt(360);
const orientation = z.string().refine(isSupportedOrientation, {
  message: 'orientation must be [M][S]R<0-359> with an integer angle',
});

const point = z.object({ x: coordinate, y: coordinate }).strict();

// ---- Drawing primitives ----

const wire = z.object({
  kind: z.literal('wire'),
  layer: layerNumber,
  start: point,
  end: point,
  width: length,
  curve: curve.optional(),
}).strict();

const polygon = z.object({
  kind: z.literal('polygon'),
  layer: layerNumber,
  vertices: z.array(z.object({ position: point, curve: curve.optional() }).strict()),
  width: length,
  isolate: length.optional(),
  rank: z.number().int().min(0).max(7).optional(),
}).strict();

const text = z.object({
  kind: z.literal('text'),
  layer: layerNumber,
  text: z.string(),
  position: point,
  size: length,
  rot: orientation.optional(),
  align: z.enum([
    'bottom-left', 'bottom-center', 'bottom-right',
    'center-left', 'center', 'center-right',
    'top-left', 'top-center', 'top-right',
  ]).optional(),
}).strict();

const dimension = z.object({
  kind: z.literal('dimension'),
  layer: layerNumber,
  points: z.tuple([point, point, point]),
  dimensionType: z.enum(['parallel', 'horizontal', 'vertical', 'radius', 'diameter', 'leader']).optional(),
}).strict();

const circle = z.object({
  kind: z.literal('circle'),
  layer: layerNumber,
  center: point,
  radius: length,
  width: length,
}).strict();

const rectangle = z.object({
  kind: z.literal('rectangle'),
  layer: layerNumber,
  start: point,
  end: point,
}).strict();

const frame = z.object({
  kind: z.literal('frame'),
  layer: layerNumber,
  start: point,
  end: point,
  columns: z.number().int().positive(),
  rows: z.number().int().positive(),
}).strict();

const hole = z.object({
  kind: z.literal('hole'),
  position: point,
  drill: length,
}).strict();

const plainPrimitive = z.discriminatedUnion('kind', [
  wire, polygon, text, dimension, circle, rectangle, frame, hole,
]);

const packagePrimitive = z.discriminatedUnion('kind', [
  wire, polygon, text, circle, rectangle, hole,
]);

// ---- Libraries ----

const pad = z.object({
  name: z.string(),
  position: point,
  drill: length,
  diameter: length.optional(),
  shape: z.enum(['round', 'square', 'octagon', 'long', 'offset']).optional(),
  rot: orientation.optional(),
}).strict();

const smd = z.object({
  name: z.string(),
  position: point,
  dx: length,
  dy: length,
  layer: layerNumber,
  roundness: z.number().int().min(0).max(100).optional(),
  rot: orientation.optional(),
}).strict();

const pkg = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  primitives: z.array(packagePrimitive),
  pads: z.array(pad),
  smds: z.array(smd),
}).strict();

const library = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  packages: z.array(pkg),
}).strict().superRefine((lib, ctx) => {
  reportDuplicates(lib.packages.map(p => p.name), ['packages'], 'package', ctx);
});

// ---- Elements & signals ----

const elementAttribute = z.object({
  name: z.string().min(1),
  value: z.string().optional(),
  position: point.optional(),
  rot: orientation.optional(),
  layer: layerNumber.optional(),
  size: length.optional(),
  display: z.enum(['off', 'value', 'name', 'both']).optional(),
}).strict();

const element = z.object({
  name: z.string().min(1),
  library: z.string().min(1),
  package: z.string().min(1),
  value: z.string(),
  position: point,
  rot: orientation.optional(),
  locked: z.boolean().optional(),
  smashed: z.boolean().optional(),
  label: z.string().optional(),
  attributes: z.array(elementAttribute),
  variants: z.array(z.object({
    name: z.string().min(1),
    populate: z.boolean().optional(),
    value: z.string().optional(),
  }).strict()),
}).strict();

const signal = z.object({
  name: z.string().min(1),
  netClass: z.number().int().nonnegative().optional(),
  contacts: z.array(z.object({
    element: z.string().min(1),
    pad: z.string().min(1),
    route: z.enum(['all', 'any']).optional(),
  }).strict()),
  wires: z.array(wire),
  vias: z.array(z.object({
    position: point,
    extent: z.string().regex(/^\d+-\d+$/, 'via extent must look like "1-16"'),
    drill: length,
    diameter: length.optional(),
    shape: z.enum(['round', 'square', 'octagon']).optional(),
  }).strict()),
  polygons: z.array(polygon),
}).strict();

// ---- Board sections ----

const layer = z.object({
  number: layerNumber,
  name: z.string(),
  color: z.number().int().nonnegative(),
  fill: z.number().int().nonnegative(),
  visible: z.boolean(),
  active: z.boolean(),
}).strict();

const gridUnit = z.enum(['mic', 'mm', 'mil', 'inch']);

const grid = z.object({
  distance: z.number().positive(),
  unit: gridUnit,
  style: z.enum(['lines', 'dots']),
  multiple: z.number().int().positive(),
  display: z.boolean(),
  altDistance: z.number().positive().optional(),
  altUnit: gridUnit.optional(),
}).strict();

const netClass = z.object({
  number: z.number().int().nonnegative(),
  name: z.string(),
  width: length,
  drill: length,
  clearances: z.array(z.object({
    netClass: z.number().int().nonnegative(),
    value: length,
  }).strict()),
}).strict();

const designRules = z.object({
  name: z.string(),
  description: z.string().optional(),
  params: z.record(z.string()),
}).strict();

const autorouterPass = z.object({
  name: z.string(),
  refer: z.string().optional(),
  active: z.boolean().optional(),
  params: z.record(z.string()),
}).strict();

// ---- Document ----

export const boardSchema = z.object({
  version: z.string().refine(isSupportedSchemaVersion, {
    message: `schema version must be ${MIN_SCHEMA_MAJOR}.x to ${MAX_SCHEMA_MAJOR}.x`,
  }),
  settings: z.record(z.string()),
  grid: grid.optional(),
  layers: z.array(layer),
  plain: z.array(plainPrimitive),
  libraries: z.array(library),
  attributes: z.array(z.object({ name: z.string().min(1), value: z.string() }).strict()).optional(),
  variantDefs: z.array(z.object({ name: z.string().min(1), current: z.boolean().optional() }).strict()).optional(),
  classes: z.array(netClass).optional(),
  designRules,
  autorouter: z.array(autorouterPass).optional(),
  elements: z.array(element),
  signals: z.array(signal),
  compatibility: z.array(z.string()).optional(),
}).strict().superRefine((board, ctx) => {
  reportDuplicates(board.layers.map(l => String(l.number)), ['layers'], 'layer number', ctx);
  reportDuplicates(board.libraries.map(l => l.name), ['libraries'], 'library', ctx);
  reportDuplicates(board.elements.map(e => e.name), ['elements'], 'element name', ctx);
  reportDuplicates(board.signals.map(s => s.name), ['signals'], 'signal name', ctx);
});

export type BoardSchemaOutput = z.infer<typeof boardSchema>;

function reportDuplicates(
  names: string[],
  path: (string | number)[],
  what: string,
  ctx: z.RefinementCtx,
): void {
  const seen = new Set<string>();
  names.forEach((name, index) => {
    if (seen.has(name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [...path, index],
        message: `duplicate ${what} ${name}`,
      });
    }
    seen.add(name);
  });
}
