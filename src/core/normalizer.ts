import { noopSink, type MergeEventSink } from './types.js';

// Every function here fails closed: bad input yields null (or the input passed
// through) and never throws.

export type FinishStatus = 'Finished' | 'DNF' | 'DNS' | 'DSQ' | 'Withdrew' | 'Unknown';

const STATUS_LOOKUP: Readonly<Record<string, FinishStatus>> = {
  FINISHED: 'Finished',
  F: 'Finished',
  DNF: 'DNF',
  'DID NOT FINISH': 'DNF',
  'NOT CLASSIFIED': 'DNF',
  NC: 'DNF',
  RETIRED: 'DNF',
  R: 'DNF',
  DNS: 'DNS',
  'DID NOT START': 'DNS',
  DSQ: 'DSQ',
  DISQUALIFIED: 'DSQ',
  EX: 'DSQ',
  WD: 'Withdrew',
  WITHDREW: 'Withdrew',
};

const STATUS_HEURISTICS: ReadonlyArray<readonly [readonly string[], FinishStatus]> = [
  [['DNF', 'NOT FINISH'], 'DNF'],
  [['DNS', 'NOT START'], 'DNS'],
  [['DSQ', 'DISQUAL'], 'DSQ'],
  [['WITHDR'], 'Withdrew'],
  [['FINISH', 'COMPLETED'], 'Finished'],
];

const TYRE_COMPOUNDS: Readonly<Record<string, string>> = {
  SOFT: 'SOFT',
  MEDIUM: 'MEDIUM',
  HARD: 'HARD',
  INTERMEDIATE: 'INTERMEDIATE',
  WET: 'WET',
  C1: 'C1',
  C2: 'C2',
  C3: 'C3',
  C4: 'C4',
  C5: 'C5',
  SUPERSOFT: 'C5',
  ULTRASOFT: 'C5',
  HYPERSOFT: 'C5',
};

const CIRCUIT_SUBSTITUTIONS: ReadonlyArray<readonly [string, string]> = [
  ['Grand Prix', 'GP'],
  ['International Circuit', 'Circuit'],
  ['Racing Circuit', 'Circuit'],
];

const TIME_STRING_PATTERN = /^\d+:\d{2}(:\d{2})?(\.\d+)?$/;

type WallClock = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
  // Minutes east of UTC when the text carried an offset; null for naive input.
  offsetMinutes: number | null;
};

const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

// Tried in order after ISO-8601. Each captures date parts and an optional time.
const FALLBACK_TIMESTAMPS: ReadonlyArray<{
  pattern: RegExp;
  order: 'ymd' | 'dmy';
}> = [
  { pattern: /^(\d{4})\/(\d{1,2})\/(\d{1,2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/, order: 'ymd' },
  { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?: (\d{1,2}):(\d{2})(?::(\d{2}))?)?$/, order: 'dmy' },
  { pattern: /^(\d{1,2})\.(\d{1,2})\.(\d{4})(?: (\d{1,2}):(\d{2})(?::(\d{2}))?)?$/, order: 'dmy' },
];

function parseOffsetMinutes(zone: string | undefined): number | null {
  if (!zone) return null;
  if (zone.toUpperCase() === 'Z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (hours * 60 + minutes);
}

function parseWallClock(text: string): WallClock | null {
  const iso = ISO_TIMESTAMP.exec(text);
  if (iso) {
    const [, y, mo, d, h, mi, s, frac, zone] = iso;
    return {
      year: Number(y),
      month: Number(mo),
      day: Number(d),
      hour: Number(h ?? 0),
      minute: Number(mi ?? 0),
      second: Number(s ?? 0),
      millisecond: frac ? Number(frac.padEnd(3, '0').slice(0, 3)) : 0,
      offsetMinutes: parseOffsetMinutes(zone),
    };
  }
  for (const { pattern, order } of FALLBACK_TIMESTAMPS) {
    const match = pattern.exec(text);
    if (!match) continue;
    const [, a, b, c, h, mi, s] = match;
    const [year, month, day] =
      order === 'ymd' ? [Number(a), Number(b), Number(c)] : [Number(c), Number(b), Number(a)];
    return {
      year,
      month,
      day,
      hour: Number(h ?? 0),
      minute: Number(mi ?? 0),
      second: Number(s ?? 0),
      millisecond: 0,
      offsetMinutes: null,
    };
  }
  return null;
}

function wallClockMs(clock: WallClock): number | null {
  const ms = Date.UTC(
    clock.year,
    clock.month - 1,
    clock.day,
    clock.hour,
    clock.minute,
    clock.second,
    clock.millisecond,
  );
  const check = new Date(ms);
  // Rejects rollovers such as 2023-02-30 or 25:00.
  if (
    check.getUTCFullYear() !== clock.year ||
    check.getUTCMonth() !== clock.month - 1 ||
    check.getUTCDate() !== clock.day ||
    check.getUTCHours() !== clock.hour ||
    check.getUTCMinutes() !== clock.minute
  ) {
    return null;
  }
  return ms;
}

function zoneOffsetMinutes(utcMs: number, timeZone: string): number {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  }).formatToParts(new Date(utcMs));
  const get = (type: Intl.DateTimeFormatPartTypes) =>
    Number(parts.find((part) => part.type === type)?.value ?? 0);
  const asUtc = Date.UTC(
    get('year'),
    get('month') - 1,
    get('day'),
    get('hour'),
    get('minute'),
    get('second'),
  );
  return Math.round((asUtc - Math.floor(utcMs / 1000) * 1000) / 60_000);
}

function localizeWallClock(wallMs: number, timeZone: string): number {
  const first = wallMs - zoneOffsetMinutes(wallMs, timeZone) * 60_000;
  // A second pass settles instants that straddle a DST change.
  const offset = zoneOffsetMinutes(first, timeZone);
  return wallMs - offset * 60_000;
}

/**
 * Converts a Date or timestamp text to a UTC instant. Naive text is read in
 * `sourceTimezone` (an IANA zone) when given, otherwise as UTC.
 */
export function normalizeTimestamp(
  value: unknown,
  sourceTimezone?: string,
  log: MergeEventSink = noopSink,
): Date | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(value.getTime());
  }
  if (typeof value !== 'string') {
    log({
      type: 'normalize-failed',
      field: 'timestamp',
      value: String(value),
      reason: `unsupported type ${typeof value}`,
    });
    return null;
  }

  const text = value.trim();
  const clock = parseWallClock(text);
  const wallMs = clock ? wallClockMs(clock) : null;
  if (!clock || wallMs === null) {
    log({ type: 'normalize-failed', field: 'timestamp', value, reason: 'unparseable' });
    return null;
  }

  if (clock.offsetMinutes !== null) {
    return new Date(wallMs - clock.offsetMinutes * 60_000);
  }
  if (!sourceTimezone) return new Date(wallMs);

  try {
    return new Date(localizeWallClock(wallMs, sourceTimezone));
  } catch (error) {
    log({
      type: 'normalize-failed',
      field: 'timestamp',
      value,
      reason: `unknown timezone ${sourceTimezone}: ${error instanceof Error ? error.message : String(error)}`,
    });
    return null;
  }
}

export function normalizeStatus(status: unknown): string {
  const text =
    typeof status === 'string'
      ? status.trim()
      : typeof status === 'number' && Number.isFinite(status)
        ? String(status)
        : '';
  if (!text) return 'Unknown';

  const upper = text.toUpperCase();
  const exact = STATUS_LOOKUP[upper];
  if (exact) return exact;

  for (const [needles, mapped] of STATUS_HEURISTICS) {
    if (needles.some((needle) => upper.includes(needle))) return mapped;
  }
  return text;
}

function isAllCaps(word: string): boolean {
  return word === word.toUpperCase() && word !== word.toLowerCase();
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/** Collapses whitespace and capitalizes words, keeping short abbreviations like "GP". */
export function normalizeName(name: unknown): string {
  if (typeof name !== 'string') return '';
  return name
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => (isAllCaps(word) && word.length <= 3 ? word : capitalize(word)))
    .join(' ');
}

export function normalizeCircuitName(name: unknown): string {
  let normalized = normalizeName(name);
  for (const [from, to] of CIRCUIT_SUBSTITUTIONS) {
    normalized = normalized.split(from).join(to);
  }
  return normalized.trim();
}

export function alignLapNumber(
  value: unknown,
  source = 'unknown',
  log: MergeEventSink = noopSink,
): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') {
    const digits = value.replace(/[^0-9]/g, '');
    return digits ? Number.parseInt(digits, 10) : null;
  }
  if (typeof value === 'number') {
    if (Number.isFinite(value)) return Math.trunc(value);
    log({ type: 'normalize-failed', field: 'lap', value: String(value), source, reason: 'not finite' });
    return null;
  }
  log({
    type: 'normalize-failed',
    field: 'lap',
    value: String(value),
    source,
    reason: `unsupported type ${typeof value}`,
  });
  return null;
}

/** Lap, sector or race time as `M:SS[.mmm]` or `H:MM:SS[.mmm]`. */
export function normalizeTimeString(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const cleaned = value
    .trim()
    .replace(/^\+/, '')
    .replace(/[^\d:.]/g, '');
  return TIME_STRING_PATTERN.test(cleaned) ? cleaned : null;
}

export function normalizeDriverCode(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const upper = value.trim().toUpperCase();
  if (upper.length < 3) return null;
  const code = upper.slice(0, 3);
  return /^\p{L}{3}$/u.test(code) ? code : null;
}

export function normalizeTyreCompound(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const upper = value.trim().toUpperCase();
  if (!upper) return null;
  return TYRE_COMPOUNDS[upper] ?? upper;
}

export function normalizePosition(value: unknown): number | null {
  let parsed: number;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string') {
    const text = value.trim();
    if (!text) return null;
    const numeric = Number(text);
    if (Number.isFinite(numeric)) {
      parsed = numeric;
    } else {
      // "P3", "3rd"
      const digits = text.replace(/[^0-9]/g, '');
      if (!digits) return null;
      parsed = Number.parseInt(digits, 10);
    }
  } else {
    return null;
  }
  if (!Number.isFinite(parsed)) return null;
  const position = Math.trunc(parsed);
  return position > 0 ? position : null;
}

export function normalizeCarNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 ? value : null;
  }
  if (typeof value === 'string') {
    const match = /^#?(\d+)$/.exec(value.trim());
    return match ? Number.parseInt(match[1] ?? '', 10) : null;
  }
  return null;
}

export function normalizePoints(value: unknown): number | null {
  const parsed =
    typeof value === 'number'
      ? value
      : typeof value === 'string' && value.trim().length > 0
        ? Number(value.trim())
        : NaN;
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : null;
}
