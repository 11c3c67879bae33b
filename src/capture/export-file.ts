/**
 * Export File Source
 *
 * Reads a metadata listing exported from a storage provider (API dump or UI
 * scrape) as JSON: either an array of records or `{ "files": [...] }`.
 * Each record needs a string `id` and `name`; every other field is kept as-is.
 *
 * The file is re-read on every call, so a post capture sees a fresh export.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { JsonObject, JsonValue } from '../types.js';
import type { MetadataRecord } from '../integrity/types.js';
import type { MetadataSource, PartialCapture, SourceEntry } from './interface.js';

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ]),
);

const ExportRecordSchema = z
  .record(z.string(), JsonValueSchema)
  .refine((record) => typeof record.id === 'string' && record.id !== '', {
    message: 'record is missing a string "id"',
  })
  .refine((record) => typeof record.name === 'string', {
    message: 'record is missing a string "name"',
  });

const ExportFileSchema = z.union([
  z.array(ExportRecordSchema),
  z.object({ files: z.array(ExportRecordSchema) }).passthrough(),
]);

export interface ExportFileSourceOptions {
  /** Path to the exported JSON listing */
  path: string;
}

export class ExportFileSource implements MetadataSource {
  readonly id = 'export-file';
  private readonly path: string;

  constructor(options: ExportFileSourceOptions) {
    this.path = options.path;
  }

  async listCandidates(): Promise<SourceEntry[]> {
    const records = await this.load();
    return records.map((record) => ({
      id: readString(record.id),
      name: readString(record.name),
      side: {
        modifiedTime: record.modifiedTime,
        size: record.size,
        location: record.location,
      },
    }));
  }

  async capture(ids: ReadonlyArray<string>): Promise<MetadataRecord[]> {
    const { records, missing } = await this.captureAvailable(ids);
    if (missing.length > 0) {
      throw new Error(`File id "${missing[0]}" not found in ${this.path}`);
    }
    return records;
  }

  async captureAvailable(ids: ReadonlyArray<string>): Promise<PartialCapture> {
    const byId = new Map<string, JsonObject>();
    for (const record of await this.load()) {
      const id = readString(record.id);
      if (!byId.has(id)) byId.set(id, record);
    }

    const records: MetadataRecord[] = [];
    const missing: string[] = [];
    for (const id of ids) {
      const record = byId.get(id);
      if (record) {
        records.push(record);
      } else {
        missing.push(id);
      }
    }
    return { records, missing };
  }

  private async load(): Promise<JsonObject[]> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err) {
      throw new Error(
        `Cannot read export file ${this.path}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new Error(
        `Export file ${this.path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    const result = ExportFileSchema.safeParse(data);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new Error(`Invalid export file ${this.path}: ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }

    return Array.isArray(result.data) ? result.data : result.data.files;
  }
}

function readString(value: JsonValue | undefined): string {
  return typeof value === 'string' ? value : '';
}
