import path from "path";
import { fileURLToPath } from "url";
import { readFile } from "fs/promises";
import { z } from "zod";
import { PlantRecordSchema } from "../../src/storage/plant-record.schemas.js";
import { scientificName, type PlantRecord } from "../../src/schema.js";
import type { RandomSource } from "../../src/engine/sampling.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
export const FIXTURE_DIR = path.resolve(__dirname, "../fixtures");
export const PLANTS_FIXTURE_PATH = path.join(FIXTURE_DIR, "plants.json");

export const loadFixturePlants = async (): Promise<PlantRecord[]> => {
  const raw = await readFile(PLANTS_FIXTURE_PATH, "utf8");
  return z.array(PlantRecordSchema).parse(JSON.parse(raw));
};

export const names = (plants: readonly Pick<PlantRecord, "genus" | "species">[]): string[] =>
  plants.map(scientificName);

export const makePlant = (overrides: Partial<PlantRecord> & Pick<PlantRecord, "genus" | "species">): PlantRecord => ({
  minZone: 3,
  maxZone: 9,
  minHeight: null,
  maxHeight: null,
  ...overrides,
  traits: {
    "full sun": true,
    neutral: true,
    mesic: true,
    "medium soil": true,
    "life cycle": "perennial",
    ...overrides.traits
  }
});

export const constantRandom = (value: number): RandomSource => () => value;

/**
 * Small deterministic PRNG (mulberry32) for property-style loops.
 */
export const seededRandom = (seed: number): RandomSource => {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};
