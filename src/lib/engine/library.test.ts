import { describe, it, expect } from 'vitest';
import { MM, makeLibrary, makePackage } from '@/test/fixtures';
import { LibraryConflictError } from './errors';
import { mergeLibraries, resolvePackage } from './library';

describe('mergeLibraries', () => {
  it('appends libraries the output does not have', () => {
    const { libraries, deduplicated } = mergeLibraries([makeLibrary('RES')], [makeLibrary('CAP')]);
    expect(libraries.map(l => l.name)).toEqual(['RES', 'CAP']);
    expect(deduplicated).toEqual([]);
  });

  it('keeps one copy of identical libraries', () => {
    const existing = [makeLibrary('RES')];
    const { libraries, deduplicated } = mergeLibraries(existing, [makeLibrary('RES')]);
    expect(libraries).toHaveLength(1);
    expect(libraries[0]).toBe(existing[0]);
    expect(deduplicated).toEqual(['RES']);
  });

  it('treats a reordered but otherwise identical library as identical', () => {
    const pkg = makePackage();
    const reordered = makePackage('R0805', { smds: [...pkg.smds].reverse(), primitives: [...pkg.primitives].reverse() });
    const { libraries } = mergeLibraries([makeLibrary('RES', [pkg])], [makeLibrary('RES', [reordered])]);
    expect(libraries).toHaveLength(1);
  });

  it('rejects a same-named library with different content', () => {
    const divergent = makeLibrary('RES', [makePackage('R0805', { pads: [{ name: 'TP', position: { x: 0, y: 0 }, drill: 800_000 }] })]);

    let error: unknown;
    try {
      mergeLibraries([makeLibrary('RES')], [divergent]);
    } catch (err) {
      error = err;
    }
    expect(error).toBeInstanceOf(LibraryConflictError);
    expect(error).toMatchObject({
      library: 'RES',
      packageName: undefined,
      path: 'packages[R0805].pads[TP]',
      code: 'LIBRARY_CONFLICT',
    });
  });

  it('rejects a polygon whose vertices come in a different order', () => {
    const outline = (corners: [number, number][]) => makePackage('R0805', {
      primitives: [{
        kind: 'polygon',
        layer: 1,
        width: 0,
        vertices: corners.map(([x, y]) => ({ position: { x, y } })),
      }],
    });
    const square = makeLibrary('RES', [outline([[0, 0], [MM, 0], [MM, MM], [0, MM]])]);
    const bowTie = makeLibrary('RES', [outline([[0, 0], [MM, MM], [MM, 0], [0, MM]])]);

    expect(() => mergeLibraries([square], [bowTie])).toThrow(
      new LibraryConflictError('RES', undefined, 'packages[R0805].primitives[0].vertices[1].position.y', 0, MM),
    );
    expect(() => mergeLibraries([square], [bowTie], { matching: 'package' })).toThrow(LibraryConflictError);
  });

  it('rejects a library that only adds a package when whole libraries must match', () => {
    const larger = makeLibrary('RES', [makePackage('R0805'), makePackage('R0603')]);
    expect(() => mergeLibraries([makeLibrary('RES')], [larger])).toThrow(LibraryConflictError);
  });

  describe('package matching', () => {
    it('unions the packages of same-named libraries', () => {
      const { libraries } = mergeLibraries(
        [makeLibrary('RES', [makePackage('R0805')])],
        [makeLibrary('RES', [makePackage('R0603'), makePackage('R0805')])],
        { matching: 'package' },
      );
      expect(libraries).toHaveLength(1);
      expect(libraries[0].packages.map(p => p.name)).toEqual(['R0805', 'R0603']);
    });

    it('rejects same-named packages with different content', () => {
      const wider = makePackage('R0805', { description: 'Wide chip resistor' });
      expect(() => mergeLibraries([makeLibrary('RES')], [makeLibrary('RES', [wider])], { matching: 'package' }))
        .toThrow('Conflicting definitions of package R0805 of library RES at description: "Chip resistor" != "Wide chip resistor"');
    });

    it('keeps the first description', () => {
      const { libraries } = mergeLibraries(
        [{ name: 'RES', packages: [] }],
        [{ name: 'RES', description: 'Resistors', packages: [] }],
        { matching: 'package' },
      );
      expect(libraries[0].description).toBe('Resistors');
    });
  });

  it('does not modify its arguments', () => {
    const existing = [makeLibrary('RES', [makePackage('R0805')])];
    const incoming = [makeLibrary('RES', [makePackage('R0603')]), makeLibrary('CAP')];
    mergeLibraries(existing, incoming, { matching: 'package' });
    expect(existing).toHaveLength(1);
    expect(existing[0].packages).toHaveLength(1);
    expect(incoming).toHaveLength(2);
  });
});

describe('resolvePackage', () => {
  it('finds a package by library and package name', () => {
    expect(resolvePackage([makeLibrary('RES')], 'RES', 'R0805')?.name).toBe('R0805');
    expect(resolvePackage([makeLibrary('RES')], 'RES', 'R0603')).toBeUndefined();
    expect(resolvePackage([makeLibrary('RES')], 'CAP', 'R0805')).toBeUndefined();
  });
});
