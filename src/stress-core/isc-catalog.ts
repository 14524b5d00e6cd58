import { createReadStream } from 'fs';
import path from 'path';
import { pipeline } from 'stream/promises';
import { parse } from 'csv-parse';
import { z } from 'zod';
import {
  CATALOG_TYPES,
  DAY_MS,
  ISC_FIELDS,
  KM_TO_M,
  VALID_MAGNITUDE_TYPES,
} from '@shared/constants';
import { ConfigurationError } from '@shared/errors';
import type { CatalogEvent, CatalogQuery, CatalogSource } from './catalog';
import { geodesicDistanceKm } from './geodesy';

// ---------------------------------------------------------------------------
// Row conversion
// ---------------------------------------------------------------------------

type IscField = (typeof ISC_FIELDS)[number];

export interface IscRow {
  author: string;
  dateTime: Date;
  lat: number;
  lon: number;
  depth: number;
  magnitudeAuthor: string;
  magnitude: number;
  magnitudeType: string;
  stations: number;
  eventType: string;
  eventId: string;
}

const rowSchema = z.array(z.string()).length(ISC_FIELDS.length);

const DATE_TIME_RE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

function parseDateTime(value: string): Date | null {
  // Fractional seconds are dropped.
  const match = DATE_TIME_RE.exec(value.split('.')[0].trim());
  if (!match) return null;
  const [, year, month, day, hour, minute, second] = match.map(Number);
  return new Date(Date.UTC(year, month - 1, day, hour, minute, second));
}

// Empty or non-numeric fields become NaN and are rejected by isRowValid where they matter.
function toNumber(value: string): number {
  return value.trim() === '' ? Number.NaN : Number(value);
}

/**
 * Converts one CSV record to typed fields. Returns null when the record has
 * the wrong shape or an unreadable timestamp. Depth is forced negative and
 * stays in kilometers.
 */
export function convertTypes(record: unknown): IscRow | null {
  const parsed = rowSchema.safeParse(record);
  if (!parsed.success) return null;

  const col = (field: IscField) => parsed.data[ISC_FIELDS.indexOf(field)].trim();

  const dateTime = parseDateTime(col('date_time'));
  if (!dateTime) return null;

  const depth = toNumber(col('depth'));
  return {
    author: col('author'),
    dateTime,
    lat: toNumber(col('lat')),
    lon: toNumber(col('lon')),
    depth: Number.isNaN(depth) ? depth : -Math.abs(depth),
    magnitudeAuthor: col('magnitude_author'),
    magnitude: toNumber(col('magnitude')),
    magnitudeType: col('magnitude_type'),
    stations: Number.parseInt(col('stations'), 10),
    eventType: col('event_type'),
    eventId: col('event_id'),
  };
}

export function isRowValid(row: IscRow): boolean {
  if (!row.magnitudeAuthor) return false;
  if (!VALID_MAGNITUDE_TYPES.some((type) => type === row.magnitudeType)) return false;
  if (Number.isNaN(row.magnitude)) return false;
  if (!(row.lat >= -80 && row.lat <= 84)) return false;
  if (!(row.lon >= -180 && row.lon <= 180)) return false;
  return Number.isFinite(row.depth);
}

/** Calendar years (UTC) touched by [start, start + days]. */
export function yearRange(start: Date, days: number): number[] {
  const end = new Date(start.getTime() + days * DAY_MS);
  const years: number[] = [];
  for (let year = start.getUTCFullYear(); year <= end.getUTCFullYear(); year++) {
    years.push(year);
  }
  return years;
}

function isCatalogType(value: string): value is CatalogQuery['catalogType'] {
  return CATALOG_TYPES.some((type) => type === value);
}

// ---------------------------------------------------------------------------
// Source
// ---------------------------------------------------------------------------

/**
 * ISC bulletin CSV files laid out as `<root>/<type>csv/<year>.csv`, one
 * event per line in ISC_FIELDS order.
 */
export class IscCatalogSource implements CatalogSource {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async fetchEvents(query: CatalogQuery): Promise<CatalogEvent[]> {
    if (!isCatalogType(query.catalogType)) {
      throw new ConfigurationError(`Invalid catalog type: ${query.catalogType}`);
    }
    const end = new Date(query.start.getTime() + query.days * DAY_MS);
    console.warn(
      `[CATALOG] Reading ${query.catalogType} events from ${query.start.toISOString()} ` +
        `for ${query.days} days within ${query.radiusKm} km`,
    );

    const rows: IscRow[] = [];
    for (const year of yearRange(query.start, query.days)) {
      const file = path.join(this.root, `${query.catalogType}csv`, `${year}.csv`);
      const yearRows = await this.readFile(file, (row) => {
        if (!isRowValid(row)) return false;
        if (row.dateTime < query.start || row.dateTime > end) return false;
        return (
          geodesicDistanceKm({ latitude: row.lat, longitude: row.lon }, query.position) <=
          query.radiusKm
        );
      });
      rows.push(...yearRows);
    }

    rows.sort((a, b) => a.dateTime.getTime() - b.dateTime.getTime());
    return rows.map((row) => ({
      latitude: row.lat,
      longitude: row.lon,
      depth: row.depth * KM_TO_M,
      magnitude: row.magnitude,
      magnitudeType: row.magnitudeType,
      occurredAt: row.dateTime,
      author: row.author,
      eventId: row.eventId,
    }));
  }

  private async readFile(file: string, keep: (row: IscRow) => boolean): Promise<IscRow[]> {
    const rows: IscRow[] = [];
    try {
      await pipeline(
        createReadStream(file),
        parse({ relax_column_count: true, skip_empty_lines: true, trim: true }),
        async (records: AsyncIterable<unknown>) => {
          for await (const record of records) {
            const row = convertTypes(record);
            if (!row) {
              console.warn(`[CATALOG] Skipping malformed row in ${file}`);
              continue;
            }
            if (keep(row)) rows.push(row);
          }
        },
      );
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[CATALOG] Error reading ${file}: ${message}`);
    }
    return rows;
  }
}
