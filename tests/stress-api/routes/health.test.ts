import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { createApp } from '../../../src/stress-api/app';
import { testDependencies } from '../helpers';

describe('GET /api/health', () => {
  it('reports a loaded solver', async () => {
    const res = await request(createApp(testDependencies())).get('/api/health');
    expect(res.status).toBe(200);
    expect(res.body.success).toBe(true);
    expect(res.body.data.status).toBe('ok');
    expect(res.body.data.solverLoaded).toBe(true);
  });

  it('reports a missing solver', async () => {
    const res = await request(createApp(testDependencies({ solver: null }))).get('/api/health');
    expect(res.body.data.solverLoaded).toBe(false);
  });
});
