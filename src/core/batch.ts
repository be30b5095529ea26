import { promises as fs } from 'node:fs';
import { z } from 'zod';
import type { MergeBatch } from './merger.js';

const recordsBySourceSchema = z.record(
  z.string().min(1),
  z.array(z.record(z.string(), z.unknown())),
);

export const mergeBatchSchema = z
  .object({
    drivers: recordsBySourceSchema.optional(),
    constructors: recordsBySourceSchema.optional(),
    races: recordsBySourceSchema.optional(),
    results: recordsBySourceSchema.optional(),
  })
  .strict();

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseMergeBatch(value: unknown, label = 'batch'): MergeBatch {
  const parsed = mergeBatchSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid ${label}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export async function loadMergeBatch(filePath: string): Promise<MergeBatch> {
  const raw = await fs.readFile(filePath, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(raw) as unknown;
  } catch (err) {
    throw new Error(`Batch file ${filePath} is not valid JSON.`, { cause: err });
  }
  return parseMergeBatch(json, `batch file ${filePath}`);
}

export function countBatchRecords(batch: MergeBatch): number {
  let total = 0;
  for (const bySource of [batch.drivers, batch.constructors, batch.races, batch.results]) {
    for (const records of Object.values(bySource ?? {})) total += records.length;
  }
  return total;
}
