export const API_PREFIX = '/api';

// ISC catalog variants accepted by the catalog reader and the run parameters.
export const CATALOG_TYPES = ['comp', 'ehb', 'rev'] as const;

export const RUN_STATUSES = ['completed', 'failed'] as const;

export const TENSOR_FIELDS = [
  'strains',
  'stresses',
  'strains_deviatoric',
  'stresses_deviatoric',
] as const;

export const SCALAR_QUANTITIES = [
  'cfs',
  'cfs_shear_only',
  'cfs_total',
  'cfs_total_shear_only',
  'cfs_normal',
  'i1',
  'i2',
  'i3',
  'max_shear',
] as const;

// Magnitude types an ISC row may carry and still be kept.
export const VALID_MAGNITUDE_TYPES = ['Mb', 'mb', 'ML', 'Ml', 'ml', 'Mw', 'MW', 'Ms', 'MS'] as const;

// Column order of an ISC catalog CSV row.
export const ISC_FIELDS = [
  'author',
  'date_time',
  'lat',
  'lon',
  'major_axis',
  'minor_axis',
  'strike',
  'depth',
  'depfixflag',
  'depth_uncertainty',
  'magnitude_author',
  'magnitude',
  'magnitude_type',
  'stations',
  'event_type',
  'event_id',
] as const;

export const KM_TO_M = 1e3;
export const DAY_MS = 24 * 60 * 60 * 1000;

// Coarse radius of the catalog query; the buffered region does the fine filter.
export const CATALOG_QUERY_RADIUS_KM = 1000;

export const DEFAULT_RUN_PARAMETERS = {
  coefficientOfFriction: 0.4,
  lameLambda: 3e10,
  shearModulusMu: 3e10,
  nearFieldDistance: 100e3,
  spacingGrid: 10e3,
  obsDepth: -10e3,
  days: 100,
  catalogType: 'rev',
} as const;
