import { z } from "zod";
import {
  MOISTURE_BANDS,
  PH_BANDS,
  REGIONS,
  SUN_LEVELS,
  type MoistureBand,
  type PhBand,
  type Region,
  type SoilTextureClass,
  type SunLevel
} from "../schema.js";
import { InvalidParameterError } from "../errors.js";
import { defaultRandom, randomInt, type RandomSource } from "../engine/sampling.js";
import { matchSoilTexture, normalizeTerm } from "./soil-texture.js";

export const MIN_LAYERS = 2;
export const MAX_LAYERS = 7;

/**
 * Site parameters as a request handler hands them over.
 */
export const RawSiteParamsSchema = z.object({
  soilTexture: z.string().default("medium"),
  ph: z.number().finite().default(6.5),
  water: z.string().default("mesic"),
  zone: z.number().int().min(1).max(10).default(7),
  sun: z.string().default("full sun"),
  region: z.string().default("all"),
  includeTrees: z.boolean().default(true),
  edibleOnly: z.boolean().default(false),
  perennialOnly: z.boolean().default(true),
  numLayers: z.number().int().min(MIN_LAYERS).max(MAX_LAYERS).nullish()
});

export type RawSiteParams = z.input<typeof RawSiteParamsSchema>;

export interface SiteProfile {
  readonly zone: number;
  /**
   * Winter low for the zone in °F, for temperature-based data sources.
   */
  readonly minTemperatureF: number;
  readonly ph: number;
  readonly phBand: PhBand;
  /**
   * Most sun-loving first, starting at the requested level.
   */
  readonly sunTolerances: readonly SunLevel[];
  readonly soilTextureClass: SoilTextureClass;
  readonly moistureBand: MoistureBand;
  readonly region: Region;
  readonly includeTrees: boolean;
  readonly edibleOnly: boolean;
  readonly perennialOnly: boolean;
  readonly numLayers: number;
}

export interface SiteProfileOptions {
  random?: RandomSource;
}

// Lower bound of each band after the first, aligned with PH_BANDS.
const PH_BAND_FLOORS = [4.5, 5.1, 5.6, 6.1, 6.6, 7.4, 7.9, 8.5] as const;

export const phToBand = (ph: number): PhBand => {
  let index = 0;
  while (index < PH_BAND_FLOORS.length && ph >= PH_BAND_FLOORS[index]) {
    index += 1;
  }
  return PH_BANDS[index];
};

export const zoneToMinTemperatureF = (zone: number): number => {
  if (!Number.isInteger(zone) || zone < 1 || zone > 10) {
    throw new InvalidParameterError("zone", `expected an integer from 1 to 10, got ${zone}`);
  }
  return -70 + 10 * zone;
};

export const sunTolerancesFrom = (level: string): SunLevel[] => {
  const normalized = normalizeTerm(level);
  const start = SUN_LEVELS.findIndex((candidate) => candidate === normalized);
  if (start === -1) {
    throw new InvalidParameterError("sun", `unknown sun level "${level}"`);
  }
  return SUN_LEVELS.slice(start);
};

export const classifySoilTexture = (input: string): SoilTextureClass => {
  const textureClass = matchSoilTexture(input);
  if (!textureClass) {
    throw new InvalidParameterError("soilTexture", `unknown soil texture "${input}"`);
  }
  return textureClass;
};

export const normalizeMoistureBand = (input: string): MoistureBand => {
  const normalized = normalizeTerm(input);
  const band = MOISTURE_BANDS.find((candidate) => candidate === normalized);
  if (!band) {
    throw new InvalidParameterError("water", `unknown moisture band "${input}"`);
  }
  return band;
};

const normalizeRegion = (input: string): Region => {
  const normalized = normalizeTerm(input);
  const region = REGIONS.find((candidate) => candidate === normalized);
  if (!region) {
    throw new InvalidParameterError("region", `unknown region "${input}"`);
  }
  return region;
};

/**
 * Every profile field except a layer count that has yet to be drawn.
 */
export type SiteConditions = Omit<SiteProfile, "numLayers">;

export interface NormalizedSite {
  conditions: SiteConditions;
  /**
   * `null` when the caller left the count to chance.
   */
  numLayers: number | null;
}

export const normalizeSiteParams = (raw: RawSiteParams | Record<string, unknown> = {}): NormalizedSite => {
  const parsed = RawSiteParamsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidParameterError(issue.path.join(".") || "params", issue.message);
  }
  const params = parsed.data;

  return {
    conditions: {
      zone: params.zone,
      minTemperatureF: zoneToMinTemperatureF(params.zone),
      ph: params.ph,
      phBand: phToBand(params.ph),
      sunTolerances: Object.freeze(sunTolerancesFrom(params.sun)),
      soilTextureClass: classifySoilTexture(params.soilTexture),
      moistureBand: normalizeMoistureBand(params.water),
      region: normalizeRegion(params.region),
      includeTrees: params.includeTrees,
      edibleOnly: params.edibleOnly,
      perennialOnly: params.perennialOnly
    },
    numLayers: params.numLayers ?? null
  };
};

export const completeSiteProfile = (site: NormalizedSite, options: SiteProfileOptions = {}): SiteProfile =>
  Object.freeze({
    ...site.conditions,
    numLayers: site.numLayers ?? randomInt(MIN_LAYERS, MAX_LAYERS, options.random ?? defaultRandom)
  });

export const buildSiteProfile = (
  raw: RawSiteParams | Record<string, unknown> = {},
  options: SiteProfileOptions = {}
): SiteProfile => completeSiteProfile(normalizeSiteParams(raw), options);
