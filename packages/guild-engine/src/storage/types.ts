import type { PlantRecord } from "../schema.js";

/**
 * Read-only access to the plant collection produced by the data pipeline.
 */
export interface PlantStore {
  list(): Promise<readonly PlantRecord[]>;
  find?(genus: string, species: string): Promise<PlantRecord[]>;
}
