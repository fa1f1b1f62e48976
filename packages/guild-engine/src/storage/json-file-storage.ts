import { promises as fs } from "fs";
import type { PlantRecord } from "../schema.js";
import { silentLogger, type Logger } from "../logger.js";
import { findByName } from "./memory-storage.js";
import { PlantFileSchema, PlantRecordSchema } from "./plant-record.schemas.js";
import type { PlantStore } from "./types.js";

export interface JsonFilePlantStoreOptions {
  path: string;
  logger?: Logger;
}

/**
 * Plant collection backed by one JSON file. The file is read and validated on
 * first use; records that fail validation are logged and left out.
 */
export class JsonFilePlantStore implements PlantStore {
  private readonly path: string;
  private readonly logger: Logger;
  private loading?: Promise<readonly PlantRecord[]>;

  constructor(options: JsonFilePlantStoreOptions) {
    this.path = options.path;
    this.logger = options.logger ?? silentLogger;
  }

  list(): Promise<readonly PlantRecord[]> {
    if (!this.loading) {
      this.loading = this.load();
      this.loading.catch(() => {
        this.loading = undefined;
      });
    }
    return this.loading;
  }

  async find(genus: string, species: string): Promise<PlantRecord[]> {
    return findByName(await this.list(), genus, species);
  }

  private async load(): Promise<readonly PlantRecord[]> {
    const raw = await fs.readFile(this.path, "utf8");
    const file = PlantFileSchema.parse(JSON.parse(raw));
    const entries = Array.isArray(file) ? file : file.plants;

    const records: PlantRecord[] = [];
    entries.forEach((entry, index) => {
      const parsed = PlantRecordSchema.safeParse(entry);
      if (!parsed.success) {
        this.logger.warn(
          { path: this.path, index, issue: parsed.error.issues[0]?.message },
          "Skipping invalid plant record"
        );
        return;
      }
      records.push(parsed.data);
    });

    this.logger.info({ path: this.path, records: records.length, skipped: entries.length - records.length }, "Loaded plant collection");
    return Object.freeze(records);
  }
}

export const createJsonFilePlantStore = (options: JsonFilePlantStoreOptions): JsonFilePlantStore =>
  new JsonFilePlantStore(options);
