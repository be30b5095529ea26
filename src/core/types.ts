export type RawRecord = Readonly<Record<string, unknown>>;

export type RecordsBySource = Readonly<Record<string, readonly RawRecord[]>>;

export type OrderedSources = ReadonlyArray<
  readonly [source: string, records: readonly RawRecord[]]
>;

export type SourceId = string | number;

// A contributing source maps to null when its record carried no native id.
export type SourceIds = Record<string, SourceId | null>;

export type UnifiedDriver = {
  unifiedId: number;
  driverRef: string;
  forename: string;
  surname: string;
  fullName: string;
  code: string | null;
  number: number | null;
  nationality: string | null;
  dateOfBirth: string | null;
  sourceIds: SourceIds;
};

export type UnifiedConstructor = {
  constructorId: number;
  constructorRef: string;
  name: string;
  nationality: string | null;
  sourceIds: SourceIds;
};

export type UnifiedRace = {
  raceId: number;
  year: number;
  round: number;
  name: string | null;
  date: string | null;
  // UTC ISO instant, when some source gave a time of day.
  startsAt: string | null;
  circuitId: SourceId | null;
  circuitRef: string | null;
  sourceIds: SourceIds;
};

export type UnifiedResult = {
  raceId: number;
  driverId: SourceId;
  position: number | null;
  points: number | null;
  status: string;
  laps: number | null;
  time: string | null;
  // Priority order; a single entry when only one source reported.
  sources: string[];
};

export type UnifiedDataset = {
  drivers: UnifiedDriver[];
  constructors: UnifiedConstructor[];
  races: UnifiedRace[];
  results: UnifiedResult[];
};

export type ConflictCandidate = {
  source: string;
  priority: number;
  value: unknown;
};

export type Conflict = {
  field: string;
  candidates: ConflictCandidate[];
  resolved: unknown;
};

export type EntityKind = 'driver' | 'constructor' | 'race' | 'result';

export type MergeEvent =
  | { type: 'driver-created'; unifiedId: number; source: string; name: string }
  | {
      type: 'driver-matched';
      unifiedId: number;
      source: string;
      name: string;
      via: 'code' | 'number' | 'name';
      score: number;
    }
  | { type: 'constructor-created'; constructorId: number; source: string; name: string }
  | { type: 'constructor-matched'; constructorId: number; source: string; name: string }
  | { type: 'race-created'; raceId: number; source: string; year: number; round: number }
  | { type: 'race-matched'; raceId: number; source: string; year: number; round: number }
  | { type: 'record-skipped'; entity: EntityKind; source: string; reason: string }
  | { type: 'field-conflict'; entity: EntityKind; entityId: SourceId; conflict: Conflict }
  | { type: 'normalize-failed'; field: string; value: string; source?: string; reason: string }
  | {
      type: 'merge-finished';
      entity: EntityKind;
      count: number;
      sources: string[];
    };

export type MergeEventSink = (event: MergeEvent) => void;

export const noopSink: MergeEventSink = () => {};
