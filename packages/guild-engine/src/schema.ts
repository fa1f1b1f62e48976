/**
 * Core schema definitions for plant records and assembled guilds.
 * The trait vocabularies below are the single description of the plant
 * dataset; they are fixed at load time and never extended while filtering.
 */

export const SUN_LEVELS = [
  "full sun",
  "full sun to partial shade",
  "partial or dappled shade",
  "partial shade to full shade",
  "full shade"
] as const;
export type SunLevel = typeof SUN_LEVELS[number];

export const PH_BANDS = [
  "extremely acid",
  "very strongly acid",
  "strongly acid",
  "moderately acid",
  "slightly acid",
  "neutral",
  "slightly alkaline",
  "moderately alkaline",
  "strongly alkaline"
] as const;
export type PhBand = typeof PH_BANDS[number];

export const MOISTURE_BANDS = ["in water", "wet", "wet mesic", "mesic", "dry mesic", "dry"] as const;
export type MoistureBand = typeof MOISTURE_BANDS[number];

export const SOIL_TEXTURE_CLASSES = ["coarse", "medium", "fine"] as const;
export type SoilTextureClass = typeof SOIL_TEXTURE_CLASSES[number];

export const PLANT_HABITS = [
  "tree",
  "shrub",
  "herb/forb",
  "fern",
  "vine",
  "groundcover",
  "cactus/succulent",
  "grass/grass-like"
] as const;
export type PlantHabit = typeof PLANT_HABITS[number];

export const ROOT_STRUCTURES = ["rhizome", "tuber", "taproot"] as const;
export type RootStructure = typeof ROOT_STRUCTURES[number];

export const EDIBLE_PARTS = [
  "edible inner bark",
  "edible stems",
  "edible leaves",
  "edible roots",
  "edible sap",
  "edible fruit",
  "edible flowers",
  "edible seeds",
  "edible seedpods",
  "edible shoots"
] as const;
export type EdiblePart = typeof EDIBLE_PARTS[number];

export const REGIONS = ["all", "northeast", "southeast", "midwest", "plains", "pacific"] as const;
export type Region = typeof REGIONS[number];

export const TREE_HABIT: PlantHabit = "tree";
export const NITROGEN_FIXER_TRAIT = "nitrogen fixer";
export const LIFE_CYCLE_TRAIT = "life cycle";

/**
 * Guild layers in the order they are reported.
 */
export const GUILD_LAYERS = [
  "canopy",
  "understory",
  "shrub",
  "herb",
  "vine",
  "rhizome",
  "groundcover"
] as const;
export type GuildLayer = typeof GUILD_LAYERS[number];

export type LowerLayer = Exclude<GuildLayer, "canopy" | "understory">;

/**
 * Stored trait value. `null` records an explicitly unknown value; a key that
 * is missing altogether is also unknown, and neither is read as `false`.
 */
export type TraitValue = boolean | string | null;

export type TraitBag = Readonly<Record<string, TraitValue>>;

export interface PlantRecord {
  genus: string;
  species: string;
  commonName?: string;
  traits: TraitBag;
  /**
   * Minimum cold-hardiness zone. Unknown values never pass a zone check.
   */
  minZone: number | null;
  /**
   * Maximum recommended zone; `null` means no upper bound.
   */
  maxZone: number | null;
  /**
   * Heights in feet.
   */
  minHeight: number | null;
  maxHeight: number | null;
}

export interface GuildEntry {
  layer: GuildLayer;
  plant: PlantRecord;
  referenceUrl: string;
}

export interface GuildMetadata {
  engineVersion: string;
  generatedAt: string;
  numLayers: number;
  /**
   * Layers drawn for this guild, excluding groundcover.
   */
  sampledLayers: GuildLayer[];
  /**
   * True when fewer layers were drawn than `numLayers - 1` asked for.
   */
  clamped: boolean;
}

export interface Guild {
  entries: GuildEntry[];
  metadata: GuildMetadata;
}

export const scientificName = (plant: Pick<PlantRecord, "genus" | "species">): string =>
  `${plant.genus} ${plant.species}`;
