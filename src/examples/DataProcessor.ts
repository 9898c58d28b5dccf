import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { DataFormatError } from '@core/errors.ts';
import { parse as parseCsv } from 'csv-parse/sync';
import { stringify as stringifyCsv } from 'csv-stringify/sync';
import { z } from 'zod';

export type DataRecord = Record<string, unknown>;

const csvRowsSchema = z.array(z.record(z.string()));

/**
 * DataProcessor
 * File-backed JSON/CSV persistence plus record transforms, used by the integration suite
 */
export class DataProcessor {
  private constructor(readonly dataDir: string) {}

  /**
   * Create a processor, making its directory if needed
   */
  static async create(dataDir: string): Promise<DataProcessor> {
    await mkdir(dataDir, { recursive: true });
    return new DataProcessor(dataDir);
  }

  pathOf(filename: string): string {
    return join(this.dataDir, filename);
  }

  async saveJson(data: unknown, filename: string): Promise<string> {
    const path = this.pathOf(filename);
    await writeFile(path, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
    return path;
  }

  /**
   * Read a JSON file
   * A missing file rejects with the filesystem error (ENOENT).
   */
  async loadJson(filename: string): Promise<unknown> {
    const path = this.pathOf(filename);
    const raw = await readFile(path, 'utf-8');

    try {
      return JSON.parse(raw);
    } catch (error) {
      throw new DataFormatError(`Malformed JSON in ${filename}`, path, { cause: error });
    }
  }

  /**
   * Read a JSON file and validate its shape
   */
  async loadJsonAs<S extends z.ZodTypeAny>(filename: string, schema: S): Promise<z.infer<S>> {
    const result = schema.safeParse(await this.loadJson(filename));
    if (!result.success) {
      throw new DataFormatError(`Unexpected content in ${filename}`, this.pathOf(filename), {
        cause: result.error,
      });
    }
    return result.data;
  }

  /**
   * Write records as CSV, columns taken from the first record
   * An empty list writes an empty file.
   */
  async saveCsv(records: readonly DataRecord[], filename: string): Promise<string> {
    const path = this.pathOf(filename);
    const [first] = records;
    const content = first
      ? stringifyCsv([...records], { header: true, columns: Object.keys(first) })
      : '';

    await writeFile(path, content, 'utf-8');
    return path;
  }

  /**
   * Read CSV rows keyed by header; every value comes back as a string
   */
  async loadCsv(filename: string): Promise<Record<string, string>[]> {
    const path = this.pathOf(filename);
    const raw = await readFile(path, 'utf-8');

    let rows: unknown;
    try {
      rows = parseCsv(raw, { columns: true, skip_empty_lines: true });
    } catch (error) {
      throw new DataFormatError(`Malformed CSV in ${filename}`, path, { cause: error });
    }

    const result = csvRowsSchema.safeParse(rows);
    if (!result.success) {
      throw new DataFormatError(`Unexpected CSV rows in ${filename}`, path, {
        cause: result.error,
      });
    }
    return result.data;
  }

  /**
   * Add computed fields: total = price * quantity, fullName = firstName + lastName
   * Returns new records; the input is left untouched.
   */
  transform<T extends DataRecord>(records: readonly T[]): (T & DataRecord)[] {
    return records.map((record) => {
      const computed: DataRecord = {};

      if ('price' in record && 'quantity' in record) {
        computed.total = Number(record.price) * Math.trunc(Number(record.quantity));
      }
      if ('firstName' in record && 'lastName' in record) {
        computed.fullName = `${String(record.firstName)} ${String(record.lastName)}`;
      }

      return { ...record, ...computed };
    });
  }

  /**
   * Keep records whose fields equal every given criterion
   */
  filter<T extends DataRecord>(records: readonly T[], criteria: DataRecord): T[] {
    const entries = Object.entries(criteria);
    return records.filter((record) => entries.every(([key, value]) => record[key] === value));
  }
}
