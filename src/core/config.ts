import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { SimilarityStrategyName } from './similarity.js';
import { APP_NAME, getConfigDir } from './xdg.js';

const CONFIG_FILENAME = 'config.json';

const similarityStrategySchema = z.enum([
  'sequence',
  'token-set',
]) satisfies z.ZodType<SimilarityStrategyName>;

export const appConfigSchema = z
  .object({
    similarityThreshold: z.number().min(0).max(1).optional(),
    similarityStrategy: similarityStrategySchema.optional(),
    // IANA zone per source, applied to timestamps that carry no offset.
    sourceTimezones: z
      .record(z.string(), z.string().min(1).refine(isValidTimeZone, 'unknown IANA timezone'))
      .optional(),
    outputDir: z.string().min(1).optional(),
  })
  .strict();

export type AppConfig = z.infer<typeof appConfigSchema>;

export const SETTABLE_KEYS = ['similarityThreshold', 'similarityStrategy', 'outputDir'] as const;

export type SettableKey = (typeof SETTABLE_KEYS)[number];

export function getAppConfigPath(appName: string = APP_NAME): string {
  return path.join(getConfigDir(appName), CONFIG_FILENAME);
}

function parseConfig(value: unknown, configPath: string): AppConfig {
  const parsed = appConfigSchema.safeParse(value);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config at ${configPath}: ${details}`);
  }
  return parsed.data;
}

export async function readAppConfig(appName: string = APP_NAME): Promise<AppConfig> {
  const configPath = getAppConfigPath(appName);
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException | undefined)?.code === 'ENOENT') return {};
    throw err;
  }
  let json: unknown;
  try {
    json = JSON.parse(raw) as unknown;
  } catch (err) {
    throw new Error(`Config at ${configPath} is not valid JSON.`, { cause: err });
  }
  return parseConfig(json, configPath);
}

/**
 * Merges `patch` into the stored config. Keys set to undefined are removed;
 * the file is deleted once nothing is left.
 */
export async function updateAppConfig(
  patch: Partial<AppConfig>,
  appName: string = APP_NAME,
): Promise<AppConfig> {
  const configPath = getAppConfigPath(appName);
  const current = await readAppConfig(appName);
  const next = parseConfig({ ...current, ...patch }, configPath);
  for (const key of appConfigSchema.keyof().options) {
    if (next[key] === undefined) delete next[key];
  }

  if (Object.keys(next).length === 0) {
    await fs.unlink(configPath).catch((err: unknown) => {
      if ((err as NodeJS.ErrnoException | undefined)?.code === 'ENOENT') return;
      throw err;
    });
    return next;
  }

  await fs.mkdir(path.dirname(configPath), { recursive: true });
  await fs.writeFile(configPath, JSON.stringify(next, null, 2) + '\n', 'utf-8');
  return next;
}

export function parseThreshold(raw: string): number {
  const text = raw.trim();
  const value = Number(text);
  if (text.length === 0 || !Number.isFinite(value) || value < 0 || value > 1) {
    throw new Error(`similarityThreshold must be a number between 0 and 1, got "${raw}".`);
  }
  return value;
}

export function parseStrategyName(raw: string): SimilarityStrategyName {
  const parsed = similarityStrategySchema.safeParse(raw.trim());
  if (!parsed.success) {
    throw new Error(`similarityStrategy must be "sequence" or "token-set", got "${raw}".`);
  }
  return parsed.data;
}

/** Converts CLI text for a settable key into its typed value. */
export function parseConfigValue(key: SettableKey, raw: string): Partial<AppConfig> {
  if (key === 'similarityThreshold') return { similarityThreshold: parseThreshold(raw) };
  if (key === 'similarityStrategy') return { similarityStrategy: parseStrategyName(raw) };
  const text = raw.trim();
  if (text.length === 0) {
    throw new Error('outputDir is empty.');
  }
  return { outputDir: text };
}

export function isSettableKey(key: string): key is SettableKey {
  return (SETTABLE_KEYS as readonly string[]).includes(key);
}

export function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch (err) {
    if (err instanceof RangeError) return false;
    throw err;
  }
}

/** Sets or, with no zone, clears the IANA zone used for one source's naive timestamps. */
export async function setSourceTimezone(
  source: string,
  zone: string | undefined,
  appName: string = APP_NAME,
): Promise<AppConfig> {
  const key = source.trim();
  if (!key) throw new Error('Source name is empty.');
  const trimmed = zone?.trim();
  if (trimmed !== undefined && !isValidTimeZone(trimmed)) {
    throw new Error(`Unknown timezone "${zone}". Use an IANA name such as Europe/London.`);
  }
  const current = await readAppConfig(appName);
  const timezones = { ...current.sourceTimezones };
  if (trimmed === undefined) {
    delete timezones[key];
  } else {
    timezones[key] = trimmed;
  }
  return updateAppConfig(
    { sourceTimezones: Object.keys(timezones).length > 0 ? timezones : undefined },
    appName,
  );
}
