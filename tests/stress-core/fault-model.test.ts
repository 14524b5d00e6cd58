import { describe, it, expect, vi, beforeAll } from 'vitest';
import { readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { buildFaultModel, type FaultModel } from '../../src/stress-core/fault-model';
import { parseSrcmod, type RuptureDescription } from '../../src/stress-core/srcmod';
import { RuptureParseError } from '../../src/shared/errors';

const fixture = readFileSync(
  path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../fixtures/srcmod/test.fsp'),
  'utf-8',
);

describe('buildFaultModel', () => {
  let model: FaultModel;

  beforeAll(() => {
    model = buildFaultModel(parseSrcmod(fixture));
  });

  it('emits one patch per sub-fault', () => {
    expect(model.patches).toHaveLength(4);
  });

  it('reads header metadata', () => {
    expect(model.metadata).toEqual({
      tag: 's2001TESTXX01ALPH',
      description: 'TEST SYNTHETIC 04/12/2001 [Test et al. (2020)]',
      depth: 10,
      magnitude: 6.5,
      moment: 7.0e18,
    });
    expect(model.zone).toEqual({ number: 54, letter: 'S' });
  });

  it('derives patch size from the segment fields', () => {
    const [patch] = model.patches;
    expect(patch.length).toBe(10000);
    // LEN / depth rows
    expect(patch.width).toBe(10000);
    expect(patch.angle).toBe(90);
    expect(patch.strike).toBe(0);
    expect(patch.dip).toBe(90);
  });

  it('lays corners along strike and down dip', () => {
    const [patch] = model.patches;
    const [c1, c2, c3, c4] = patch.local.corners;
    expect(c1.y - c2.y).toBeCloseTo(10000, 6);
    expect(c1.x - c2.x).toBeCloseTo(0, 6);
    expect(c1.y).toBeCloseTo(0, 6);
    expect(c3.z - c1.z).toBe(5000);
    expect(c4.y).toBeCloseTo(c2.y, 6);
    expect(patch.topDepth).toBe(0);
    expect(patch.bottomDepth).toBe(5000);
  });

  it('offsets projected corners from the projected patch center', () => {
    const patch = model.patches[1];
    const [c1, c2] = patch.projected.corners;
    expect(c1.y - patch.projected.topCenter.y).toBeCloseTo(5000, 6);
    expect(patch.projected.topCenter.y - c2.y).toBeCloseTo(5000, 6);
  });

  it('splits slip by rake', () => {
    const patch = model.patches[2];
    expect(patch.rake).toBe(90);
    expect(patch.slipStrike).toBeCloseTo(0, 12);
    expect(patch.slipDip).toBeCloseTo(1.5, 12);
    expect(model.patches[1].slipStrike).toBe(2);
  });

  it('averages dip and strike without weighting', () => {
    expect(model.dipMean).toBe(90);
    expect(model.strikeMean).toBe(0);
  });

  it('freezes patches', () => {
    expect(Object.isFrozen(model.patches)).toBe(true);
    expect(Object.isFrozen(model.patches[0])).toBe(true);
  });

  it('projects the epicenter into its zone', () => {
    expect(model.epicenter.latitude).toBe(35);
    expect(model.epicenter.longitude).toBe(139);
    expect(model.epicenter.x).toBeLessThan(500000);
  });
});

describe('buildFaultModel edge cases', () => {
  const row = (z: number) => ({ LAT: 35, LON: 139, X: 0, Y: 0, Z: z, SLIP: 1 });
  const base: RuptureDescription = {
    date: '1/1/2000',
    occurredAt: new Date(Date.UTC(2000, 0, 1)),
    tags: { EVENTTAG: 'tag', EVENT: 'event' },
    fields: { LAT: 35, LON: 139, DEP: 5, MW: 6, MO: 1e18, STRK: 45, DIP: 60, DX: 2, DZ: 3, NSG: 1 },
    segments: [{ fields: { DIP: 60 }, rows: [[row(0)], [row(3)]] }],
  };

  it('skips segments with a single depth row', () => {
    const model = buildFaultModel({ ...base, segments: [{ fields: {}, rows: [[row(0)]] }] });
    expect(model.patches).toHaveLength(0);
    expect(model.dipMean).toBe(0);
    expect(model.strikeMean).toBe(0);
  });

  it('falls back to header strike and DZ width', () => {
    const model = buildFaultModel(base);
    expect(model.patches[0].strike).toBe(45);
    expect(model.patches[0].angle).toBe(45);
    expect(model.patches[0].width).toBe(3000);
    expect(model.patches[0].length).toBe(2000);
  });

  it('warns about missing optional header entries', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const model = buildFaultModel({ ...base, tags: {}, fields: { ...base.fields, MW: Number.NaN } });
    expect(model.metadata.tag).toBeUndefined();
    expect(model.metadata.magnitude).toBeUndefined();
    expect('magnitude' in model.metadata).toBe(false);
    expect(warn).toHaveBeenCalledWith('[MODEL] Rupture header has no EVENTTAG tag');
    expect(warn).toHaveBeenCalledWith('[MODEL] Rupture header has no MW field');
    warn.mockRestore();
  });

  it('requires the epicenter', () => {
    const { LAT: _lat, ...fields } = base.fields;
    expect(() => buildFaultModel({ ...base, fields })).toThrow(RuptureParseError);
  });

  it('rejects dips outside [-180, 180]', () => {
    const segments = [{ fields: { DIP: 200 }, rows: [[row(0)], [row(3)]] }];
    expect(() => buildFaultModel({ ...base, segments })).toThrow(/dip 200/);
  });
});
