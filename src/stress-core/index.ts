// stress-core: the stress-transfer pipeline. No HTTP, no database.
// The orchestrator awaits its rupture and catalog sources; everything else
// is synchronous and pure.

export * from './linear-algebra';
export * from './geodesy';
export * from './projection';
export * from './srcmod';
export * from './fault-model';
export * from './stress-field';
export * from './tensor-analysis';
export * from './spatial-buffer';
export * from './catalog';
export * from './catalog-correlator';
export * from './isc-catalog';
export * from './visualization';
export * from './run-parameters';
export * from './model-run';
