import type { PlantRecord } from "../schema.js";
import type { PlantStore } from "./types.js";

export class MemoryPlantStore implements PlantStore {
  private readonly records: readonly PlantRecord[];

  constructor(records: readonly PlantRecord[] = []) {
    this.records = Object.freeze([...records]);
  }

  async list(): Promise<readonly PlantRecord[]> {
    return this.records;
  }

  async find(genus: string, species: string): Promise<PlantRecord[]> {
    return findByName(this.records, genus, species);
  }
}

export const findByName = (records: readonly PlantRecord[], genus: string, species: string): PlantRecord[] => {
  const wantedGenus = genus.trim().toLowerCase();
  const wantedSpecies = species.trim().toLowerCase();
  return records.filter(
    (record) => record.genus.toLowerCase() === wantedGenus && record.species.toLowerCase() === wantedSpecies
  );
};
