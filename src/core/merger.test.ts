import { describe, expect, it, vi } from 'vitest';
import { createMerger, resolveConflict, type MergeBatch } from './merger.js';
import type { MergeEvent } from './types.js';

function collect() {
  const events: MergeEvent[] = [];
  return { events, log: (event: MergeEvent) => events.push(event) };
}

describe('resolveConflict', () => {
  it('returns null when nothing is present', () => {
    expect(resolveConflict([], [])).toBeNull();
    expect(resolveConflict([null, '', undefined], [10, 9, 8])).toBeNull();
  });

  it('returns a single present value', () => {
    expect(resolveConflict(['v'], [3])).toBe('v');
  });

  it('prefers the higher priority', () => {
    expect(resolveConflict(['1', '2'], [6, 10])).toBe('2');
    expect(resolveConflict(['c', 'b', 'a'], [6, 8, 10])).toBe('a');
  });

  it('skips empty values before ranking', () => {
    expect(resolveConflict(['', null, 'x'], [10, 9, 1])).toBe('x');
    expect(resolveConflict([Number.NaN, 3], [10, 1])).toBe(3);
  });

  it('keeps zero', () => {
    expect(resolveConflict([0, 18], [10, 6])).toBe(0);
  });

  it('breaks ties by input order', () => {
    expect(resolveConflict(['a', 'b'], [5, 5])).toBe('a');
  });

  it('ignores values without a priority', () => {
    expect(resolveConflict(['a', 'b'], [1])).toBe('a');
  });
});

describe('mergeConstructors', () => {
  it('keys constructors on the normalized name', () => {
    const merger = createMerger();
    const constructors = merger.mergeConstructors({
      openf1: [{ team_name: 'red   bull' }],
      ergast: [{ constructorId: 'red_bull', name: 'Red Bull' }, { constructorId: 'mclaren', name: 'McLaren' }],
      fia: [{ constructor_name: 'MCLAREN', nationality: 'British' }],
    });

    expect(constructors).toEqual([
      {
        constructorId: 1,
        constructorRef: 'constructor_1',
        name: 'Red Bull',
        nationality: null,
        sourceIds: { ergast: 'red_bull', openf1: null },
      },
      {
        constructorId: 2,
        constructorRef: 'constructor_2',
        name: 'McLaren',
        nationality: 'British',
        sourceIds: { ergast: 'mclaren', fia: null },
      },
    ]);
  });

  it('skips records without a name', () => {
    const { events, log } = collect();
    const merger = createMerger({ log });
    expect(merger.mergeConstructors({ ergast: [{ nationality: 'Italian' }] })).toEqual([]);
    expect(events[0]).toEqual({
      type: 'record-skipped',
      entity: 'constructor',
      source: 'ergast',
      reason: 'missing name',
    });
  });
});

describe('mergeRaces', () => {
  it('keeps the higher-priority name and records both sources', () => {
    const merger = createMerger();
    const races = merger.mergeRaces({
      statsf1: [{ year: 2023, round: 1, name: 'Sakhir Race' }],
      ergast: [{ season: 2023, round: 1, raceName: 'Bahrain GP' }],
    });

    expect(races).toEqual([
      {
        raceId: 1,
        year: 2023,
        round: 1,
        name: 'Bahrain GP',
        date: null,
        startsAt: null,
        circuitId: null,
        circuitRef: null,
        sourceIds: { ergast: null, statsf1: null },
      },
    ]);
  });

  it('fills empty fields from later sources', () => {
    const merger = createMerger();
    const [race] = merger.mergeRaces({
      ergast: [{ season: '2023', round: '2', Circuit: { circuitId: 'jeddah' } }],
      openf1: [{ year: 2023, round: 2, meeting_name: 'Saudi Arabian GP', date_start: '2023-03-19', meeting_key: 1141 }],
    });

    expect(race).toMatchObject({
      raceId: 1,
      name: 'Saudi Arabian GP',
      date: '2023-03-19',
      circuitRef: 'jeddah',
      sourceIds: { ergast: null, openf1: 1141 },
    });
  });

  it('derives the start instant from date and time', () => {
    const merger = createMerger({ sourceTimezones: { fia: 'Asia/Bahrain' } });
    const races = merger.mergeRaces({
      ergast: [{ season: 2023, round: 1, date: '2023-03-05', time: '15:00:00Z' }],
      fia: [
        { year: 2023, round: 2, date: '2023-03-19 20:00' },
        { year: 2023, round: 3, date: '2023-04-02' },
      ],
    });

    expect(races.map((race) => race.startsAt)).toEqual([
      '2023-03-05T15:00:00.000Z',
      '2023-03-19T17:00:00.000Z',
      null,
    ]);
  });

  it('skips records without a year and round', () => {
    const { events, log } = collect();
    const merger = createMerger({ log });
    const races = merger.mergeRaces({ fia: [{ year: 2023, round: 0 }, { name: 'Test' }] });

    expect(races).toEqual([]);
    expect(events.filter((event) => event.type === 'record-skipped')).toHaveLength(2);
  });
});

describe('mergeResults', () => {
  it('normalizes a single-source result', () => {
    const merger = createMerger();
    const results = merger.mergeResults(
      {
        statsf1: [
          { driver_id: 1, position: 'P3', points: '15', status: 'Retired', laps: 'Lap 44', time: '' },
        ],
      },
      7,
    );

    expect(results).toEqual([
      {
        raceId: 7,
        driverId: 1,
        position: 3,
        points: 15,
        status: 'DNF',
        laps: 44,
        time: null,
        sources: ['statsf1'],
      },
    ]);
  });

  it('resolves each field by priority and reports conflicts', () => {
    const { events, log } = collect();
    const merger = createMerger({ log });
    const results = merger.mergeResults(
      {
        statsf1: [{ driver_id: 1, position: 1, points: 25, status: 'Finished', laps: 57 }],
        ergast: [
          { driver_id: 1, position: 2, points: 18, status: 'Finished', laps: 57, time: '1:33:56.736' },
        ],
      },
      1,
    );

    expect(results).toEqual([
      {
        raceId: 1,
        driverId: 1,
        position: 2,
        points: 18,
        status: 'Finished',
        laps: 57,
        time: '1:33:56.736',
        sources: ['ergast', 'statsf1'],
      },
    ]);

    const conflicts = events.flatMap((event) =>
      event.type === 'field-conflict' ? [event.conflict] : [],
    );
    expect(conflicts.map((conflict) => conflict.field)).toEqual(['position', 'points']);
    expect(conflicts[0]).toEqual({
      field: 'position',
      candidates: [
        { source: 'ergast', priority: 10, value: 2 },
        { source: 'statsf1', priority: 6, value: 1 },
      ],
      resolved: 2,
    });
  });

  it('falls through malformed higher-priority values', () => {
    const merger = createMerger();
    const [result] = merger.mergeResults(
      {
        ergast: [{ driver_id: 4, position: 'DNF', status: '' }],
        statsf1: [{ driver_id: 4, position: 9, status: 'Retired' }],
      },
      1,
    );

    expect(result).toMatchObject({ position: 9, status: 'DNF', sources: ['ergast', 'statsf1'] });
  });

  it('groups by unified driver id before native ids', () => {
    const merger = createMerger();
    const results = merger.mergeResults(
      {
        ergast: [{ unified_driver_id: 1, driver_id: 'max_verstappen', position: 1 }],
        openf1: [{ unified_driver_id: 1, driver_number: 33, position: 1 }],
      },
      1,
    );

    expect(results).toHaveLength(1);
    expect(results[0]?.driverId).toBe(1);
  });

  it('skips results without a driver', () => {
    const { events, log } = collect();
    const merger = createMerger({ log });
    expect(merger.mergeResults({ fia: [{ position: 1 }] }, 1)).toEqual([]);
    expect(events[0]).toEqual({
      type: 'record-skipped',
      entity: 'result',
      source: 'fia',
      reason: 'missing driver id',
    });
  });
});

describe('mergeBatch', () => {
  const batch: MergeBatch = {
    drivers: {
      openf1: [{ full_name: 'Max VERSTAPPEN', driver_number: 33, name_acronym: 'VER' }],
      ergast: [{ driverId: 'max_verstappen', name: 'Max Verstappen', code: 'VER', number: 33 }],
    },
    races: {
      ergast: [{ season: 2023, round: 1, raceName: 'Bahrain GP' }],
    },
    results: {
      statsf1: [{ year: 2023, round: 1, driver_id: 'unknown', position: 3 }],
      openf1: [
        { year: 2023, round: 1, driver_number: 33, position: 1, points: 25 },
        { year: 2023, round: 2, driver_number: 33, position: 1 },
      ],
      ergast: [
        { season: 2023, round: 1, driverId: 'max_verstappen', position: 1, points: 25, status: 'Finished' },
      ],
    },
  };

  it('links results to unified races and drivers', () => {
    const { events, log } = collect();
    const merger = createMerger({ log });
    const dataset = merger.mergeBatch(batch);

    expect(dataset.drivers).toHaveLength(1);
    expect(dataset.drivers[0]?.sourceIds).toEqual({ ergast: 'max_verstappen', openf1: 33 });
    expect(dataset.constructors).toEqual([]);
    expect(dataset.results).toEqual([
      {
        raceId: 1,
        driverId: 1,
        position: 1,
        points: 25,
        status: 'Finished',
        laps: null,
        time: null,
        sources: ['ergast', 'openf1'],
      },
    ]);

    const skipped = events.flatMap((event) =>
      event.type === 'record-skipped' ? [`${event.source}: ${event.reason}`] : [],
    );
    expect(skipped).toEqual(['openf1: no matching race', 'statsf1: unresolved driver']);
  });

  it('is deterministic across runs', () => {
    const first = createMerger().mergeBatch(batch);
    const second = createMerger().mergeBatch(batch);
    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it('announces each finished entity with its sources in priority order', () => {
    const log = vi.fn();
    createMerger({ log }).mergeBatch(batch);
    expect(log).toHaveBeenCalledWith({
      type: 'merge-finished',
      entity: 'driver',
      count: 1,
      sources: ['ergast', 'openf1'],
    });
  });
});
