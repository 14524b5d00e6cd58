import type { CATALOG_TYPES, RUN_STATUSES, SCALAR_QUANTITIES, TENSOR_FIELDS } from './constants';

export type CatalogType = (typeof CATALOG_TYPES)[number];
export type RunStatus = (typeof RUN_STATUSES)[number];
export type TensorFieldName = (typeof TENSOR_FIELDS)[number];
export type ScalarQuantity = (typeof SCALAR_QUANTITIES)[number];

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

export interface HealthRecord {
  status: 'ok';
  solverLoaded: boolean;
  timestamp: string;
}

export interface RunListItemRecord {
  id: string;
  ruptureSource: string;
  status: RunStatus;
  error: string | null;
  createdAt: string;
}

export interface RuptureSummaryRecord {
  source: string;
  tag: string | null;
  description: string | null;
  date: string;
  epicenter: { latitude: number; longitude: number; x: number; y: number };
  zone: { number: number; letter: string };
  magnitude: number | null;
  patchCount: number;
  dipMean: number;
  strikeMean: number;
}
