// ============================================================
// Test fixtures — small, self-contained boards
// ============================================================

import type {
  BoardDocument,
  DesignRuleSet,
  Element,
  Layer,
  Library,
  Package,
  Signal,
} from '@/types';
import { NM_PER_MM } from '@/constants';

export const MM = NM_PER_MM;

export function makePackage(name = 'R0805', overrides: Partial<Package> = {}): Package {
  return {
    name,
    description: 'Chip resistor',
    primitives: [
      { kind: 'wire', layer: 21, start: { x: -MM, y: MM }, end: { x: MM, y: MM }, width: 127_000 },
      { kind: 'text', layer: 25, text: '>NAME', position: { x: -MM, y: 2 * MM }, size: 1_270_000 },
    ],
    pads: [],
    smds: [
      { name: '1', position: { x: -950_000, y: 0 }, dx: 1_300_000, dy: 1_500_000, layer: 1 },
      { name: '2', position: { x: 950_000, y: 0 }, dx: 1_300_000, dy: 1_500_000, layer: 1 },
    ],
    ...overrides,
  };
}

export function makeLibrary(name = 'RES', packages: Package[] = [makePackage()]): Library {
  return { name, description: 'Resistors', packages };
}

export function makeDesignRules(params: Record<string, string> = {}): DesignRuleSet {
  return {
    name: 'default',
    params: {
      mdWireWire: '8mil',
      mdWirePad: '8mil',
      msWidth: '10mil',
      ...params,
    },
  };
}

export function makeLayers(): Layer[] {
  return [
    { number: 1, name: 'Top', color: 4, fill: 1, visible: true, active: true },
    { number: 16, name: 'Bottom', color: 1, fill: 1, visible: true, active: true },
    { number: 21, name: 'tPlace', color: 7, fill: 1, visible: true, active: true },
  ];
}

export function makeElement(name = 'U1', overrides: Partial<Element> = {}): Element {
  return {
    name,
    library: 'RES',
    package: 'R0805',
    value: '10k',
    position: { x: 10 * MM, y: 5 * MM },
    attributes: [],
    variants: [],
    ...overrides,
  };
}

export function makeSignal(name = 'N$1', overrides: Partial<Signal> = {}): Signal {
  return {
    name,
    contacts: [{ element: 'U1', pad: '1' }],
    wires: [
      { kind: 'wire', layer: 1, start: { x: 9 * MM, y: 5 * MM }, end: { x: 2 * MM, y: 5 * MM }, width: 254_000 },
    ],
    vias: [{ position: { x: 2 * MM, y: 5 * MM }, extent: '1-16', drill: 300_000 }],
    polygons: [],
    ...overrides,
  };
}

export function makeBoard(overrides: Partial<BoardDocument> = {}): BoardDocument {
  return {
    version: '7.7.0',
    settings: { alwaysvectorfont: 'no', verticaltext: 'up' },
    grid: { distance: 0.1, unit: 'inch', style: 'lines', multiple: 1, display: false },
    layers: makeLayers(),
    plain: [
      { kind: 'wire', layer: 20, start: { x: 0, y: 0 }, end: { x: 40 * MM, y: 0 }, width: 0 },
      { kind: 'hole', position: { x: 3 * MM, y: 3 * MM }, drill: 3_200_000 },
    ],
    libraries: [makeLibrary()],
    designRules: makeDesignRules(),
    elements: [makeElement()],
    signals: [makeSignal()],
    ...overrides,
  };
}
