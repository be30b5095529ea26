import { describe, expect, it } from 'vitest';
import {
  DRIVER_FIELDS,
  FIELD_ALIASES,
  RESULT_FIELDS,
  isEmptyValue,
  readCircuitRef,
  readDriverName,
  readField,
  readInteger,
  readSourceId,
  readString,
} from './field-aliases.js';

describe('isEmptyValue', () => {
  it('treats null, blank text and NaN as empty', () => {
    expect(isEmptyValue(null)).toBe(true);
    expect(isEmptyValue(undefined)).toBe(true);
    expect(isEmptyValue('  ')).toBe(true);
    expect(isEmptyValue(Number.NaN)).toBe(true);
  });

  it('keeps zero and false', () => {
    expect(isEmptyValue(0)).toBe(false);
    expect(isEmptyValue(false)).toBe(false);
  });
});

describe('readField', () => {
  it('returns the first non-empty alias', () => {
    expect(readField({ name: '', full_name: 'Max Verstappen' }, DRIVER_FIELDS.name)).toBe(
      'Max Verstappen',
    );
  });

  it('follows alias order, not record order', () => {
    expect(readField({ Position: 4, position: 3 }, RESULT_FIELDS.position)).toBe(3);
  });

  it('ignores inherited keys', () => {
    const record = Object.create({ name: 'Inherited' });
    expect(readField(record, DRIVER_FIELDS.name)).toBeNull();
  });
});

describe('typed readers', () => {
  it('reads trimmed strings and stringified numbers', () => {
    expect(readString({ nationality: ' Dutch ' }, DRIVER_FIELDS.nationality)).toBe('Dutch');
    expect(readString({ round: 3 }, ['round'])).toBe('3');
    expect(readString({ round: true }, ['round'])).toBeNull();
  });

  it('reads source ids as given', () => {
    expect(readSourceId({ driver_number: 33 }, DRIVER_FIELDS.sourceId)).toBe(33);
    expect(readSourceId({ driverId: ' norris ' }, DRIVER_FIELDS.sourceId)).toBe('norris');
    expect(readSourceId({ id: Number.POSITIVE_INFINITY }, DRIVER_FIELDS.sourceId)).toBeNull();
  });

  it('reads integers from numbers or numeric text', () => {
    expect(readInteger({ season: '2023' }, FIELD_ALIASES.race.year)).toBe(2023);
    expect(readInteger({ round: 1.5 }, FIELD_ALIASES.race.round)).toBeNull();
    expect(readInteger({ round: 'first' }, FIELD_ALIASES.race.round)).toBeNull();
  });
});

describe('readDriverName', () => {
  it('prefers a full name', () => {
    expect(readDriverName({ FullName: 'Lando NORRIS', forename: 'Lando' })).toBe('Lando NORRIS');
  });

  it('joins split names', () => {
    expect(readDriverName({ givenName: 'Lando', familyName: 'Norris' })).toBe('Lando Norris');
    expect(readDriverName({ familyName: 'Zhou' })).toBe('Zhou');
    expect(readDriverName({ code: 'NOR' })).toBeNull();
  });
});

describe('readCircuitRef', () => {
  it('unwraps nested circuit objects', () => {
    expect(readCircuitRef({ Circuit: { circuitId: 'bahrain' } })).toBe('bahrain');
  });

  it('reads plain references', () => {
    expect(readCircuitRef({ circuit_ref: ' monza ' })).toBe('monza');
    expect(readCircuitRef({ circuit: 12 })).toBeNull();
  });
});
