import { LIFE_CYCLE_TRAIT, type PlantRecord, type TraitValue } from "../schema.js";

/**
 * Returns `undefined` when the record has no entry for the trait at all,
 * which is distinct from an entry holding `false` or `null`.
 */
export const readTrait = (plant: PlantRecord, name: string): TraitValue | undefined =>
  Object.prototype.hasOwnProperty.call(plant.traits, name) ? plant.traits[name] : undefined;

export const hasTrait = (plant: PlantRecord, name: string): boolean => readTrait(plant, name) === true;

export const hasAnyTrait = (plant: PlantRecord, names: readonly string[]): boolean =>
  names.some((name) => hasTrait(plant, name));

export const isPerennial = (plant: PlantRecord): boolean => {
  const lifeCycle = readTrait(plant, LIFE_CYCLE_TRAIT);
  return typeof lifeCycle === "string" && lifeCycle.trim().toLowerCase() === "perennial";
};
