// Reader for SRCMOD finite-fault models in the FSP text format.
//
// An FSP file is a '%'-commented header of `TAG : value` and `NAME = number`
// pairs followed by one or more segments. Each segment ends in a table of
// sub-fault rows headed by a `% LAT LON ...` line; consecutive rows sharing
// the same Z form one depth row of the segment's grid.

import { readFile } from 'fs/promises';
import path from 'path';
import { ConfigurationError, RuptureNotFoundError, RuptureParseError } from '@shared/errors';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One sub-fault line of a segment table, keyed by upper-cased column name. */
export type SubfaultRow = Readonly<Record<string, number>>;

export interface RuptureSegment {
  fields: Readonly<Record<string, number>>;
  /** Depth rows, shallowest first; every depth row has the same length. */
  rows: readonly (readonly SubfaultRow[])[];
}

export interface RuptureDescription {
  /** Event date as written in the file (m/d/yyyy). */
  date: string;
  occurredAt: Date;
  tags: Readonly<Record<string, string>>;
  fields: Readonly<Record<string, number>>;
  segments: readonly RuptureSegment[];
}

export interface RuptureSource {
  readRupture(name: string): Promise<RuptureDescription>;
}

// ---------------------------------------------------------------------------
// Patterns
// ---------------------------------------------------------------------------

// `xxx : yyy zzz`
const TAGS_RE = /(\w+\s*:\s*(?:\S+ ?)+)/g;
// `xxx = float`
const FIELDS_RE = /\w+\s+=\s+-?\d+\.?\d*[eE]?[+-]?\d*/g;
const DATE_RE = /(\d+)\/(\d+)\/(\d+)/;
const DATA_FIELDS_RE = /^%\s+LAT\s+LON/;

const MULTI_SEGMENT_DELIMITER = '% SEGMENT';
const SINGLE_SEGMENT_DELIMITER = '% SOURCE MODEL PARAMETERS';

// ---------------------------------------------------------------------------
// Header
// ---------------------------------------------------------------------------

/**
 * Finds every `NAME = number` pair. With `ignoreDuplicates` the first value
 * seen for a name wins; otherwise the last one does.
 */
export function findFields(data: string, ignoreDuplicates = true): Record<string, number> {
  const fields: Record<string, number> = {};
  for (const [match] of data.matchAll(FIELDS_RE)) {
    const separator = match.indexOf('=');
    const name = match.slice(0, separator).trim().toUpperCase();
    if (!ignoreDuplicates || !(name in fields)) {
      fields[name] = Number.parseFloat(match.slice(separator + 1).trim());
    }
  }
  return fields;
}

export function findTags(data: string): Record<string, string> {
  const tags: Record<string, string> = {};
  for (const [match] of data.matchAll(TAGS_RE)) {
    const separator = match.indexOf(':');
    tags[match.slice(0, separator).trim().toUpperCase()] = match.slice(separator + 1).trim();
  }
  return tags;
}

function parseDate(data: string): { date: string; occurredAt: Date } {
  const match = DATE_RE.exec(data);
  if (!match) {
    throw new RuptureParseError('No event date (m/d/yyyy) found in rupture description');
  }
  const [date, month, day, year] = match;
  const occurredAt = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (Number.isNaN(occurredAt.getTime())) {
    throw new RuptureParseError(`Invalid event date: ${date}`);
  }
  return { date, occurredAt };
}

// ---------------------------------------------------------------------------
// Segments
// ---------------------------------------------------------------------------

/**
 * Parses one segment's sub-fault table into depth rows. Consecutive lines
 * with equal Z belong to the same depth row.
 */
export function getSegmentData(data: string): SubfaultRow[][] {
  const depthRows: SubfaultRow[][] = [];
  let current: SubfaultRow[] = [];
  let names: string[] = [];
  let lastZ: number | null = null;

  const closeDepthRow = () => {
    depthRows.push(current);
    if (depthRows[0].length !== current.length) {
      throw new RuptureParseError(
        `Depth row ${depthRows.length} has ${current.length} sub-faults; expected ${depthRows[0].length}`,
      );
    }
    current = [];
  };

  for (const line of data.split('\n')) {
    if (line.trim() === '') continue;
    if (DATA_FIELDS_RE.test(line)) {
      names = line
        .trim()
        .split(/\s+/)
        .slice(1)
        .map((name) => name.toUpperCase().split('=')[0]);
    }
    if (line.startsWith('%')) continue;

    if (names.length === 0) {
      throw new RuptureParseError('Sub-fault data found before a "% LAT LON" column header');
    }
    const values = line.trim().split(/\s+/);
    const row: Record<string, number> = {};
    names.forEach((name, i) => {
      if (i < values.length) row[name] = Number.parseFloat(values[i]);
    });
    checkCoordinates(row);

    if (lastZ !== null && row.Z !== lastZ) closeDepthRow();
    current.push(row);
    lastZ = row.Z;
  }
  if (current.length > 0) closeDepthRow();

  return depthRows;
}

function checkCoordinates(row: Record<string, number>): void {
  for (const name of ['LAT', 'LON', 'Z']) {
    if (!(name in row) || Number.isNaN(row[name])) {
      throw new RuptureParseError(`Sub-fault row is missing a numeric ${name} column`);
    }
  }
  if (row.LON < -180 || row.LON > 180) {
    throw new RuptureParseError(`Sub-fault longitude ${row.LON} is outside [-180, 180]`);
  }
  if (row.LAT < -90 || row.LAT > 90) {
    throw new RuptureParseError(`Sub-fault latitude ${row.LAT} is outside [-90, 90]`);
  }
}

/**
 * Splits the file into segments. Multi-segment files delimit each segment
 * with its own header; a single-segment file shares the file header.
 */
export function separateSegments(
  numSegments: number,
  headerFields: Record<string, number>,
  data: string,
): { segments: string[]; segmentFields: Record<string, number>[] } {
  const delimiter = numSegments > 1 ? MULTI_SEGMENT_DELIMITER : SINGLE_SEGMENT_DELIMITER;
  if (!data.includes(delimiter)) {
    throw new RuptureParseError(`Missing "${delimiter}" delimiter for ${numSegments} segment(s)`);
  }

  const segments = data
    .split(delimiter)
    .slice(1)
    .map((segment) => delimiter + segment);
  const segmentFields =
    numSegments > 1 ? segments.map((segment) => findFields(segment)) : [headerFields];

  if (segments.length !== numSegments || segmentFields.length !== numSegments) {
    throw new RuptureParseError(
      `Header declares ${numSegments} segment(s) but ${segments.length} were found`,
    );
  }
  return { segments, segmentFields };
}

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

export function parseSrcmod(data: string): RuptureDescription {
  const { date, occurredAt } = parseDate(data);
  const tags = findTags(data);
  const fields = findFields(data);

  if (!('NSG' in fields)) {
    throw new RuptureParseError('Missing segment count (Nsg) in rupture header');
  }
  const numSegments = Math.trunc(fields.NSG);
  if (numSegments < 1) {
    throw new RuptureParseError(`Invalid segment count: ${fields.NSG}`);
  }

  const { segments, segmentFields } = separateSegments(numSegments, fields, data);

  return {
    date,
    occurredAt,
    tags,
    fields,
    segments: segments.map((segment, i) => ({
      fields: segmentFields[i],
      rows: getSegmentData(segment),
    })),
  };
}

/** Reads FSP files from a local directory. */
export class FileRuptureSource implements RuptureSource {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  resolvePath(name: string): string {
    const resolved = path.resolve(this.root, name);
    if (!resolved.startsWith(this.root + path.sep)) {
      throw new ConfigurationError(`Rupture source "${name}" is outside the rupture directory`);
    }
    return resolved;
  }

  async readRupture(name: string): Promise<RuptureDescription> {
    const filePath = this.resolvePath(name);
    console.warn(`[SRCMOD] Reading ${filePath}`);
    const text = await readFile(filePath, 'utf-8').catch((err: unknown) => {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        throw new RuptureNotFoundError(`Rupture source "${name}" not found`);
      }
      throw err;
    });
    const description = parseSrcmod(text);
    console.warn(`[SRCMOD] Read ${description.segments.length} segment(s) from ${name}`);
    return description;
  }
}
