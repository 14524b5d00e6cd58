import type { CatalogType } from '@shared/types';
import type { LatLon } from './geodesy';

/** One catalog earthquake. Depth is in meters, negative down. */
export interface CatalogEvent {
  latitude: number;
  longitude: number;
  depth: number;
  magnitude: number;
  magnitudeType: string;
  occurredAt: Date;
  author?: string;
  eventId?: string;
}

export interface CorrelatedEvent extends CatalogEvent {
  /** Projected easting/northing in the fault model's UTM zone. */
  x: number;
  y: number;
  /** Planar distance to the projected epicenter, in meters. */
  distanceToEpicenter: number;
}

export interface CatalogQuery {
  catalogType: CatalogType;
  start: Date;
  days: number;
  position: LatLon;
  radiusKm: number;
}

export interface CatalogSource {
  /** Events inside the window and radius, sorted by time. */
  fetchEvents(query: CatalogQuery): Promise<CatalogEvent[]>;
}
