import {
  GUILD_LAYERS,
  NITROGEN_FIXER_TRAIT,
  ROOT_STRUCTURES,
  TREE_HABIT,
  scientificName,
  type Guild,
  type GuildEntry,
  type GuildLayer,
  type LowerLayer,
  type PlantHabit,
  type PlantRecord,
  type RootStructure,
  type SunLevel
} from "../schema.js";
import { DEFAULT_REFERENCE_BASE_URL } from "../config.js";
import { InsufficientLayersError, NoCandidateError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { SiteProfile } from "../site/site-profile.js";
import { filterCandidates, type CandidatePool, type PlantPredicate } from "./candidate-pool.js";
import { defaultRandom, sampleDistinct, sampleOne, type RandomSource } from "./sampling.js";
import { hasAnyTrait, hasTrait } from "./traits.js";

export const CANOPY_MIN_HEIGHT = 50;

export const TREE_LAYERS: readonly GuildLayer[] = ["canopy", "understory", "shrub", "herb", "rhizome", "vine"];
export const TREELESS_LAYERS: readonly GuildLayer[] = ["shrub", "herb", "rhizome", "vine"];

/**
 * Habit and root tags that place a plant in each lower layer (any one suffices).
 */
export const LOWER_LAYER_TAGS: Readonly<Record<LowerLayer, readonly (PlantHabit | RootStructure)[]>> = {
  shrub: ["shrub"],
  herb: ["herb/forb", "fern"],
  vine: ["vine"],
  rhizome: ROOT_STRUCTURES,
  groundcover: ["groundcover"]
};

export interface GuildAssemblerOptions {
  random?: RandomSource;
  logger?: Logger;
  referenceBaseUrl?: string;
  engineVersion?: string;
}

export interface AssembleInput {
  generatedAt?: string;
}

export interface LayerSelection {
  layers: GuildLayer[];
  clamped: boolean;
}

export const selectLayers = (
  numLayers: number,
  available: readonly GuildLayer[],
  random: RandomSource,
  logger: Logger = silentLogger
): LayerSelection => {
  const requested = Math.max(0, numLayers - 1);
  if (requested > 0 && available.length === 0) {
    throw new InsufficientLayersError(requested, 0);
  }
  const clamped = requested > available.length;
  if (clamped) {
    logger.warn(
      { requested, available: available.length },
      "Requested more guild layers than are available; drawing every available layer"
    );
  }
  return { layers: sampleDistinct(available, requested, random), clamped };
};

/**
 * Sun levels open to a plant with `depth` selected tree layers above it.
 * Unshaded plants must take the site's own level; shaded ones take any
 * shadier level, keeping the shadiest when the list runs out.
 */
export const shadeTiers = (profile: SiteProfile, depth: number): readonly SunLevel[] =>
  depth === 0
    ? profile.sunTolerances.slice(0, 1)
    : profile.sunTolerances.slice(Math.min(depth, profile.sunTolerances.length - 1));

export const buildReferenceUrl = (
  plant: Pick<PlantRecord, "genus" | "species">,
  baseUrl: string = DEFAULT_REFERENCE_BASE_URL
): string => `${baseUrl}?LatinName=${encodeURIComponent(plant.genus)}+${encodeURIComponent(plant.species)}`;

export const assembleGuild = (
  pool: CandidatePool,
  options: GuildAssemblerOptions = {},
  input: AssembleInput = {}
): Guild => {
  const random = options.random ?? defaultRandom;
  const logger = options.logger ?? silentLogger;
  const { profile, plants } = pool;

  const available = profile.includeTrees ? TREE_LAYERS : TREELESS_LAYERS;
  const selection = selectLayers(profile.numLayers, available, random, logger);
  const selected = new Set<GuildLayer>(selection.layers);

  const draw = (layer: GuildLayer, predicates: PlantPredicate[]): PlantRecord => {
    const candidates = plants.filter((plant) => predicates.every((predicate) => predicate(plant)));
    const plant = sampleOne(candidates, random);
    if (!plant) {
      throw new NoCandidateError(layer);
    }
    logger.debug({ layer, plant: scientificName(plant), candidates: candidates.length }, "Sampled guild layer");
    return plant;
  };

  const picks = new Map<GuildLayer, PlantRecord>();

  const canopy = selected.has("canopy")
    ? draw("canopy", [
        (plant) => hasTrait(plant, TREE_HABIT),
        (plant) => hasAnyTrait(plant, shadeTiers(profile, 0)),
        (plant) => plant.minHeight !== null && plant.minHeight >= CANOPY_MIN_HEIGHT
      ])
    : undefined;
  if (canopy) picks.set("canopy", canopy);

  if (selected.has("understory")) {
    const understoryPredicates: PlantPredicate[] = [
      (plant) => hasTrait(plant, TREE_HABIT),
      (plant) => plant.maxHeight !== null && plant.maxHeight < CANOPY_MIN_HEIGHT
    ];
    const tiers = shadeTiers(profile, canopy ? 1 : 0);
    understoryPredicates.push((plant) => hasAnyTrait(plant, tiers));
    if (canopy) {
      const canopyFloor = canopy.minHeight;
      if (canopyFloor !== null) {
        understoryPredicates.push((plant) => plant.maxHeight !== null && plant.maxHeight < canopyFloor);
      }
    }
    picks.set("understory", draw("understory", understoryPredicates));
  }

  const depth = (picks.has("canopy") ? 1 : 0) + (picks.has("understory") ? 1 : 0);
  const lowerTiers = shadeTiers(profile, depth);
  const lowerPredicates = (layer: LowerLayer): PlantPredicate[] => [
    (plant) => hasAnyTrait(plant, LOWER_LAYER_TAGS[layer]),
    (plant) => hasAnyTrait(plant, lowerTiers)
  ];

  for (const layer of ["shrub", "herb", "vine", "rhizome"] as const) {
    if (selected.has(layer)) {
      picks.set(layer, draw(layer, lowerPredicates(layer)));
    }
  }

  const groundcoverPredicates = lowerPredicates("groundcover");
  const hasFixer = Array.from(picks.values()).some((plant) => hasTrait(plant, NITROGEN_FIXER_TRAIT));
  if (!hasFixer) {
    groundcoverPredicates.push((plant) => hasTrait(plant, NITROGEN_FIXER_TRAIT));
  }
  picks.set("groundcover", draw("groundcover", groundcoverPredicates));

  const referenceBaseUrl = options.referenceBaseUrl ?? DEFAULT_REFERENCE_BASE_URL;
  const entries: GuildEntry[] = [];
  for (const layer of GUILD_LAYERS) {
    const plant = picks.get(layer);
    if (plant) {
      entries.push({ layer, plant, referenceUrl: buildReferenceUrl(plant, referenceBaseUrl) });
    }
  }

  return {
    entries,
    metadata: {
      engineVersion: options.engineVersion ?? "layered-sampling-v1",
      generatedAt: input.generatedAt ?? new Date().toISOString(),
      numLayers: profile.numLayers,
      sampledLayers: GUILD_LAYERS.filter((layer) => selected.has(layer)),
      clamped: selection.clamped
    }
  };
};

/**
 * Filters the plant collection for a site once, then builds a fresh guild on
 * every `assemble()` call.
 */
export class GuildAssembler {
  readonly pool: CandidatePool;
  private readonly options: GuildAssemblerOptions;

  constructor(plants: readonly PlantRecord[], readonly profile: SiteProfile, options: GuildAssemblerOptions = {}) {
    this.options = options;
    this.pool = filterCandidates(plants, profile);
    options.logger?.debug(
      { total: plants.length, candidates: this.pool.plants.length },
      "Filtered plant collection for site"
    );
  }

  assemble(input: AssembleInput = {}): Guild {
    const guild = assembleGuild(this.pool, this.options, input);
    this.options.logger?.debug(
      { layers: guild.entries.map((entry) => entry.layer) },
      "Assembled guild"
    );
    return guild;
  }
}
