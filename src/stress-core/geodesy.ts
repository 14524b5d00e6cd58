import { GeodesicConvergenceError } from '@shared/errors';
import { toRadians } from './linear-algebra';

export interface LatLon {
  latitude: number;
  longitude: number;
}

// WGS84 ellipsoid
const WGS84_A = 6378137;
const WGS84_F = 1 / 298.257223563;
const WGS84_B = WGS84_A * (1 - WGS84_F);

// Mean earth radius used by the great-circle fallback.
const EARTH_RADIUS_KM = 6371.009;

const DEFAULT_MAX_ITERATIONS = 200;
const CONVERGENCE_TOLERANCE = 1e-12;

export interface DistanceOptions {
  maxIterations?: number;
}

/**
 * Ellipsoidal distance in kilometers by Vincenty's inverse formula.
 * Throws GeodesicConvergenceError when the lambda iteration does not settle,
 * which happens for nearly antipodal points.
 */
export function vincentyDistanceKm(a: LatLon, b: LatLon, options: DistanceOptions = {}): number {
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const L = toRadians(b.longitude - a.longitude);
  const U1 = Math.atan((1 - WGS84_F) * Math.tan(toRadians(a.latitude)));
  const U2 = Math.atan((1 - WGS84_F) * Math.tan(toRadians(b.latitude)));
  const sinU1 = Math.sin(U1);
  const cosU1 = Math.cos(U1);
  const sinU2 = Math.sin(U2);
  const cosU2 = Math.cos(U2);

  let lambda = L;
  let sinSigma = 0;
  let cosSigma = 1;
  let sigma = 0;
  let cosSqAlpha = 1;
  let cos2SigmaM = 0;
  let converged = false;

  for (let iteration = 0; iteration < maxIterations; iteration++) {
    const sinLambda = Math.sin(lambda);
    const cosLambda = Math.cos(lambda);
    sinSigma = Math.sqrt(
      (cosU2 * sinLambda) ** 2 + (cosU1 * sinU2 - sinU1 * cosU2 * cosLambda) ** 2,
    );
    if (sinSigma === 0) return 0; // coincident points
    cosSigma = sinU1 * sinU2 + cosU1 * cosU2 * cosLambda;
    sigma = Math.atan2(sinSigma, cosSigma);
    const sinAlpha = (cosU1 * cosU2 * sinLambda) / sinSigma;
    cosSqAlpha = 1 - sinAlpha * sinAlpha;
    // Equatorial geodesics have cosSqAlpha = 0.
    cos2SigmaM = cosSqAlpha !== 0 ? cosSigma - (2 * sinU1 * sinU2) / cosSqAlpha : 0;
    const C = (WGS84_F / 16) * cosSqAlpha * (4 + WGS84_F * (4 - 3 * cosSqAlpha));
    const previous = lambda;
    lambda =
      L +
      (1 - C) *
        WGS84_F *
        sinAlpha *
        (sigma + C * sinSigma * (cos2SigmaM + C * cosSigma * (-1 + 2 * cos2SigmaM * cos2SigmaM)));
    if (Math.abs(lambda - previous) <= CONVERGENCE_TOLERANCE) {
      converged = true;
      break;
    }
  }

  if (!converged) {
    throw new GeodesicConvergenceError(
      `Vincenty distance did not converge after ${maxIterations} iterations`,
    );
  }

  const uSq = (cosSqAlpha * (WGS84_A ** 2 - WGS84_B ** 2)) / WGS84_B ** 2;
  const A = 1 + (uSq / 16384) * (4096 + uSq * (-768 + uSq * (320 - 175 * uSq)));
  const B = (uSq / 1024) * (256 + uSq * (-128 + uSq * (74 - 47 * uSq)));
  const deltaSigma =
    B *
    sinSigma *
    (cos2SigmaM +
      (B / 4) *
        (cosSigma * (-1 + 2 * cos2SigmaM * cos2SigmaM) -
          (B / 6) * cos2SigmaM * (-3 + 4 * sinSigma * sinSigma) * (-3 + 4 * cos2SigmaM * cos2SigmaM)));

  return (WGS84_B * A * (sigma - deltaSigma)) / 1000;
}

/** Spherical (haversine) distance in kilometers. */
export function greatCircleDistanceKm(a: LatLon, b: LatLon): number {
  const phi1 = toRadians(a.latitude);
  const phi2 = toRadians(b.latitude);
  const dPhi = phi2 - phi1;
  const dLambda = toRadians(b.longitude - a.longitude);
  const h = Math.sin(dPhi / 2) ** 2 + Math.cos(phi1) * Math.cos(phi2) * Math.sin(dLambda / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(h)));
}

/** Vincenty distance, or great-circle distance when Vincenty fails to converge. */
export function geodesicDistanceKm(a: LatLon, b: LatLon, options: DistanceOptions = {}): number {
  try {
    return vincentyDistanceKm(a, b, options);
  } catch (err) {
    if (err instanceof GeodesicConvergenceError) {
      return greatCircleDistanceKm(a, b);
    }
    throw err;
  }
}
