import type { EntityKind, RawRecord, SourceId } from './types.js';

// Field names each provider is known to use, in lookup order. The first alias
// holding a non-empty value wins.

export type DriverField =
  | 'name'
  | 'forename'
  | 'surname'
  | 'code'
  | 'number'
  | 'nationality'
  | 'dateOfBirth'
  | 'driverRef'
  | 'sourceId';

export type ConstructorField = 'name' | 'nationality' | 'constructorRef' | 'sourceId';

export type RaceField =
  | 'year'
  | 'round'
  | 'name'
  | 'date'
  | 'time'
  | 'circuit'
  | 'circuitId'
  | 'sourceId';

export type ResultField =
  | 'driverId'
  | 'unifiedDriverId'
  | 'year'
  | 'round'
  | 'position'
  | 'points'
  | 'status'
  | 'laps'
  | 'time';

export const DRIVER_FIELDS: Readonly<Record<DriverField, readonly string[]>> = {
  name: ['name', 'full_name', 'fullName', 'FullName'],
  forename: ['forename', 'givenName', 'first_name', 'FirstName'],
  surname: ['surname', 'familyName', 'last_name', 'LastName'],
  code: ['code', 'driver_code', 'name_acronym', 'Tla'],
  number: ['number', 'driver_number', 'permanentNumber', 'RacingNumber'],
  nationality: ['nationality', 'country_code', 'CountryCode'],
  dateOfBirth: ['date_of_birth', 'dob', 'dateOfBirth'],
  driverRef: ['driver_ref', 'driverRef'],
  // OpenF1 keys drivers by their car number.
  sourceId: ['id', 'driver_id', 'driverId', 'driver_number'],
};

export const CONSTRUCTOR_FIELDS: Readonly<Record<ConstructorField, readonly string[]>> = {
  name: ['name', 'constructor_name', 'constructorName', 'team_name', 'TeamName'],
  nationality: ['nationality'],
  constructorRef: ['constructor_ref', 'constructorRef'],
  sourceId: ['id', 'constructor_id', 'constructorId'],
};

export const RACE_FIELDS: Readonly<Record<RaceField, readonly string[]>> = {
  year: ['year', 'season'],
  round: ['round'],
  name: ['name', 'raceName', 'race_name', 'meeting_name'],
  date: ['date', 'date_start'],
  time: ['time', 'Time', 'start_time'],
  circuit: ['circuit_ref', 'circuitRef', 'circuit', 'Circuit'],
  circuitId: ['circuit_id', 'circuit_key'],
  sourceId: ['id', 'race_id', 'raceId', 'meeting_key'],
};

export const RESULT_FIELDS: Readonly<Record<ResultField, readonly string[]>> = {
  driverId: ['driver_id', 'driverId', 'driver_number'],
  unifiedDriverId: ['unified_driver_id', 'unifiedDriverId'],
  year: ['year', 'season'],
  round: ['round'],
  position: ['position', 'Position', 'position_order'],
  points: ['points', 'Points'],
  status: ['status', 'Status'],
  laps: ['laps', 'Laps', 'number_of_laps'],
  time: ['time', 'Time', 'race_time'],
};

export const FIELD_ALIASES = {
  driver: DRIVER_FIELDS,
  constructor: CONSTRUCTOR_FIELDS,
  race: RACE_FIELDS,
  result: RESULT_FIELDS,
} as const satisfies Record<EntityKind, Readonly<Record<string, readonly string[]>>>;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return value.trim().length === 0;
  if (typeof value === 'number') return Number.isNaN(value);
  return false;
}

export function readField(record: RawRecord, aliases: readonly string[]): unknown {
  for (const alias of aliases) {
    if (!Object.hasOwn(record, alias)) continue;
    const value = record[alias];
    if (!isEmptyValue(value)) return value;
  }
  return null;
}

export function readString(record: RawRecord, aliases: readonly string[]): string | null {
  const value = readField(record, aliases);
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

export function readSourceId(record: RawRecord, aliases: readonly string[]): SourceId | null {
  const value = readField(record, aliases);
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  return null;
}

export function readInteger(record: RawRecord, aliases: readonly string[]): number | null {
  const value = readField(record, aliases);
  const parsed =
    typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : NaN;
  return Number.isInteger(parsed) ? parsed : null;
}

/**
 * The driver's display name. Archives that split the name (Ergast's
 * givenName/familyName) are joined forename first.
 */
export function readDriverName(record: RawRecord): string | null {
  const name = readString(record, DRIVER_FIELDS.name);
  if (name) return name;
  const parts = [
    readString(record, DRIVER_FIELDS.forename),
    readString(record, DRIVER_FIELDS.surname),
  ].filter((part): part is string => Boolean(part));
  return parts.length > 0 ? parts.join(' ') : null;
}

/** Circuit reference, unwrapping Ergast's nested `Circuit: { circuitId }`. */
export function readCircuitRef(record: RawRecord): string | null {
  const value = readField(record, RACE_FIELDS.circuit);
  if (isPlainObject(value)) {
    return readString(value, ['circuitId', 'circuit_ref', 'circuitRef']);
  }
  if (typeof value === 'string') return value.trim();
  return null;
}
