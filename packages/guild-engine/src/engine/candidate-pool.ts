import { EDIBLE_PARTS, TREE_HABIT, type PlantRecord } from "../schema.js";
import type { SiteProfile } from "../site/site-profile.js";
import { soilTextureTrait } from "../site/soil-texture.js";
import { hasAnyTrait, hasTrait, isPerennial } from "./traits.js";

/**
 * Plants compatible with one site. Frozen after construction, so it can be
 * shared by any number of guild assemblies.
 */
export interface CandidatePool {
  readonly profile: SiteProfile;
  readonly plants: readonly PlantRecord[];
}

export type PlantPredicate = (plant: PlantRecord) => boolean;

export const isZoneCompatible = (plant: PlantRecord, zone: number): boolean =>
  plant.minZone !== null && plant.minZone <= zone && (plant.maxZone === null || plant.maxZone >= zone);

/**
 * Site predicates in the order they are applied. All must pass.
 */
export const sitePredicates = (profile: SiteProfile): PlantPredicate[] => {
  const predicates: PlantPredicate[] = [];

  if (profile.region !== "all") {
    const region = profile.region;
    predicates.push((plant) => hasTrait(plant, region));
  }

  predicates.push(
    (plant) => isZoneCompatible(plant, profile.zone),
    (plant) => hasAnyTrait(plant, profile.sunTolerances),
    (plant) => hasTrait(plant, profile.phBand),
    (plant) => hasTrait(plant, profile.moistureBand),
    (plant) => hasTrait(plant, soilTextureTrait(profile.soilTextureClass))
  );

  if (profile.edibleOnly) {
    predicates.push((plant) => hasAnyTrait(plant, EDIBLE_PARTS));
  }
  if (!profile.includeTrees) {
    predicates.push((plant) => !hasTrait(plant, TREE_HABIT));
  }
  if (profile.perennialOnly) {
    predicates.push(isPerennial);
  }

  return predicates;
};

export const filterCandidates = (plants: readonly PlantRecord[], profile: SiteProfile): CandidatePool => {
  const predicates = sitePredicates(profile);
  const matching = plants.filter((plant) => predicates.every((predicate) => predicate(plant)));
  return Object.freeze({
    profile,
    plants: Object.freeze(matching)
  });
};
