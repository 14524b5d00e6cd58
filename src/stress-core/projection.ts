import proj4 from 'proj4';
import type { Point2 } from './linear-algebra';

// Latitude band letters, 8 degrees each from 80S.
const ZONE_LETTERS = 'CDEFGHJKLMNPQRSTUVWXX';

export interface UtmZone {
  number: number;
  letter: string;
}

export interface UtmProjector {
  zone: UtmZone;
  /** Projects geographic coordinates to UTM easting/northing in meters. */
  project(longitude: number, latitude: number): Point2;
}

export function utmZoneFor(latitude: number, longitude: number): UtmZone {
  if (latitude < -80 || latitude > 84) {
    throw new RangeError(`Latitude ${latitude} is outside the UTM range [-80, 84]`);
  }
  if (longitude < -180 || longitude > 180) {
    throw new RangeError(`Longitude ${longitude} is outside [-180, 180]`);
  }

  let number = Math.floor((longitude + 180) / 6) + 1;
  if (number > 60) number = 60;

  // Norway and Svalbard exceptions
  if (latitude >= 56 && latitude < 64 && longitude >= 3 && longitude < 12) {
    number = 32;
  }
  if (latitude >= 72 && latitude <= 84 && longitude >= 0) {
    if (longitude < 9) number = 31;
    else if (longitude < 21) number = 33;
    else if (longitude < 33) number = 35;
    else if (longitude < 42) number = 37;
  }

  const letter = ZONE_LETTERS[Math.floor((latitude + 80) / 8)];
  return { number, letter };
}

/** Builds the UTM projector for the zone containing the given epicenter. */
export function createUtmProjector(latitude: number, longitude: number): UtmProjector {
  const zone = utmZoneFor(latitude, longitude);
  const south = latitude < 0 ? ' +south' : '';
  const converter = proj4('WGS84', `+proj=utm +zone=${zone.number}${south} +ellps=WGS84 +units=m +no_defs`);

  return {
    zone,
    project(lon, lat) {
      const [x, y] = converter.forward([lon, lat]);
      return { x, y };
    },
  };
}
