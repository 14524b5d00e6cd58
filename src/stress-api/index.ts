import { createServer } from 'http';
import { FileRuptureSource } from '@core/srcmod';
import { IscCatalogSource } from '@core/isc-catalog';
import { SvgPlotRenderer } from '@core/visualization';
import { db, pool } from '@db/connection';
import { DrizzleRunStore } from '@db/run-store';
import { API_PREFIX } from '@shared/constants';
import { createApp } from './app';
import { config } from './config';
import { loadSolver } from './solver-loader';

function shutdown(server: ReturnType<typeof createServer>, signal: string) {
  console.warn(`[SERVER] ${signal} received, shutting down`);
  server.close(() => {
    pool.end().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('[SERVER] Failed to close database pool:', err);
        process.exit(1);
      },
    );
  });
  setTimeout(() => process.exit(1), 5000).unref();
}

async function start() {
  const solver = await loadSolver(config.solverModule);
  if (solver) {
    console.warn(`[SOLVER] Loaded dislocation solver from ${config.solverModule}`);
  } else {
    console.warn('[SOLVER] DISLOCATION_SOLVER_MODULE not set; model runs are disabled');
  }

  const app = createApp({
    runStore: new DrizzleRunStore(db),
    ruptureSource: new FileRuptureSource(config.srcmodDir),
    catalogSource: new IscCatalogSource(config.catalogDir),
    solver,
    visualizer: new SvgPlotRenderer(),
  });
  const server = createServer(app);

  process.on('SIGTERM', () => shutdown(server, 'SIGTERM'));
  process.on('SIGINT', () => shutdown(server, 'SIGINT'));

  server.listen(config.port, () => {
    console.warn(`[SERVER] Coulomb Stress Lab API on port ${config.port}`);
    console.warn(`[SERVER] Health: http://localhost:${config.port}${API_PREFIX}/health`);
  });
}

start().catch((err) => {
  console.error('[SERVER] Failed to start:', err);
  process.exit(1);
});
