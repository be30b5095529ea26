import { promises as fs } from 'node:fs';
import path from 'node:path';
import { tmpdir } from 'node:os';
import { afterEach, describe, expect, it } from 'vitest';
import {
  getAppConfigPath,
  isSettableKey,
  parseConfigValue,
  isValidTimeZone,
  readAppConfig,
  setSourceTimezone,
  updateAppConfig,
} from './config.js';

const APP = 'paddock-merge-test';
const originalEnv = { ...process.env };

afterEach(() => {
  process.env = { ...originalEnv };
});

let counter = 0;

function setTempConfigHome(): string {
  counter += 1;
  const base = path.join(tmpdir(), `paddock-merge-config-${process.pid}-${Date.now()}-${counter}`);
  process.env.XDG_CONFIG_HOME = base;
  process.env.APPDATA = base;
  process.env.HOME = base;
  return base;
}

describe('app config', () => {
  it('returns empty config when file is missing', async () => {
    setTempConfigHome();
    await expect(readAppConfig(APP)).resolves.toEqual({});
  });

  it('writes and reads merge settings', async () => {
    setTempConfigHome();

    await updateAppConfig({ similarityThreshold: 0.9, similarityStrategy: 'token-set' }, APP);

    const cfg = await readAppConfig(APP);
    expect(cfg).toEqual({ similarityThreshold: 0.9, similarityStrategy: 'token-set' });

    const raw = await fs.readFile(getAppConfigPath(APP), 'utf-8');
    expect(raw).toBe('{\n  "similarityThreshold": 0.9,\n  "similarityStrategy": "token-set"\n}\n');
  });

  it('merges patches into the stored config', async () => {
    setTempConfigHome();

    await updateAppConfig({ outputDir: '/srv/merged' }, APP);
    await updateAppConfig({ sourceTimezones: { fia: 'Europe/Paris' } }, APP);

    expect(await readAppConfig(APP)).toEqual({
      outputDir: '/srv/merged',
      sourceTimezones: { fia: 'Europe/Paris' },
    });
  });

  it('removes unset keys and deletes the file when empty', async () => {
    setTempConfigHome();

    await updateAppConfig({ outputDir: '/srv/merged' }, APP);
    const next = await updateAppConfig({ outputDir: undefined }, APP);

    expect(next).toEqual({});
    await expect(fs.stat(getAppConfigPath(APP))).rejects.toThrow();
  });

  it('rejects a config with unknown keys', async () => {
    setTempConfigHome();
    const configPath = getAppConfigPath(APP);
    await fs.mkdir(path.dirname(configPath), { recursive: true });
    await fs.writeFile(configPath, '{"openaiApiKey":"test-secret"}', 'utf-8');

    await expect(readAppConfig(APP)).rejects.toThrow(/Invalid config at/);
  });

  it('rejects a stored timezone that Intl does not know', async () => {
    setTempConfigHome();
    const configPath = getAppConfigPath(APP);
    await fs.mkdir(path.dirname(configPath), { recursive: true });
    await fs.writeFile(configPath, '{"sourceTimezones":{"fia":"Mars/Olympus"}}', 'utf-8');

    await expect(readAppConfig(APP)).rejects.toThrow(
      `Invalid config at ${configPath}: sourceTimezones.fia: unknown IANA timezone`,
    );
  });

  it('rejects malformed JSON', async () => {
    setTempConfigHome();
    const configPath = getAppConfigPath(APP);
    await fs.mkdir(path.dirname(configPath), { recursive: true });
    await fs.writeFile(configPath, '{', 'utf-8');

    await expect(readAppConfig(APP)).rejects.toThrow(`Config at ${configPath} is not valid JSON.`);
  });

  it('rejects out-of-range thresholds on write', async () => {
    setTempConfigHome();
    await expect(updateAppConfig({ similarityThreshold: 1.5 }, APP)).rejects.toThrow(
      /similarityThreshold/,
    );
  });
});

describe('parseConfigValue', () => {
  it('parses thresholds', () => {
    expect(parseConfigValue('similarityThreshold', ' 0.8 ')).toEqual({ similarityThreshold: 0.8 });
  });

  it('rejects thresholds outside 0..1', () => {
    expect(() => parseConfigValue('similarityThreshold', '2')).toThrow(
      'similarityThreshold must be a number between 0 and 1, got "2".',
    );
    expect(() => parseConfigValue('similarityThreshold', '')).toThrow(/between 0 and 1/);
  });

  it('parses strategies', () => {
    expect(parseConfigValue('similarityStrategy', 'token-set')).toEqual({
      similarityStrategy: 'token-set',
    });
    expect(() => parseConfigValue('similarityStrategy', 'fuzzy')).toThrow(
      'similarityStrategy must be "sequence" or "token-set", got "fuzzy".',
    );
  });

  it('trims output directories and rejects blanks', () => {
    expect(parseConfigValue('outputDir', ' out ')).toEqual({ outputDir: 'out' });
    expect(() => parseConfigValue('outputDir', '  ')).toThrow('outputDir is empty.');
  });
});

describe('isSettableKey', () => {
  it('accepts only the settable keys', () => {
    expect(isSettableKey('outputDir')).toBe(true);
    expect(isSettableKey('sourceTimezones')).toBe(false);
  });
});

describe('source timezones', () => {
  it('validates IANA names', () => {
    expect(isValidTimeZone('Europe/London')).toBe(true);
    expect(isValidTimeZone('Mars/Olympus')).toBe(false);
  });

  it('sets and clears a source zone', async () => {
    setTempConfigHome();

    await setSourceTimezone('fia', 'Europe/Paris', APP);
    await setSourceTimezone('statsf1', 'UTC', APP);
    expect((await readAppConfig(APP)).sourceTimezones).toEqual({
      fia: 'Europe/Paris',
      statsf1: 'UTC',
    });

    await setSourceTimezone('fia', undefined, APP);
    expect((await readAppConfig(APP)).sourceTimezones).toEqual({ statsf1: 'UTC' });

    const last = await setSourceTimezone('statsf1', undefined, APP);
    expect(last).toEqual({});
  });

  it('rejects unknown zones', async () => {
    setTempConfigHome();
    await expect(setSourceTimezone('fia', 'Mars/Olympus', APP)).rejects.toThrow(
      'Unknown timezone "Mars/Olympus". Use an IANA name such as Europe/London.',
    );
  });
});
