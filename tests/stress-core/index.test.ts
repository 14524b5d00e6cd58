import { describe, it, expect } from 'vitest';
import * as core from '@core/index';

describe('core entry point', () => {
  it('exposes the pipeline and its building blocks', () => {
    expect(typeof core.modelQuake).toBe('function');
    expect(typeof core.parseSrcmod).toBe('function');
    expect(typeof core.buildFaultModel).toBe('function');
    expect(typeof core.computeField).toBe('function');
    expect(typeof core.buildGrid).toBe('function');
    expect(typeof core.correlate).toBe('function');
    expect(typeof core.IscCatalogSource).toBe('function');
    expect(typeof core.SvgPlotRenderer).toBe('function');
  });
});
