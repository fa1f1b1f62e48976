import type { PlantRecord } from "../schema.js";
import { GuildAssembler, type GuildAssemblerOptions } from "../engine/guild-assembler.js";
import { silentLogger } from "../logger.js";
import {
  completeSiteProfile,
  normalizeSiteParams,
  type NormalizedSite,
  type RawSiteParams,
  type SiteProfileOptions
} from "../site/site-profile.js";

export const DEFAULT_MAX_ASSEMBLERS = 16;

export interface GuildAssemblerCacheOptions extends GuildAssemblerOptions, SiteProfileOptions {
  /**
   * Assemblers kept at once; the least recently used one is dropped first.
   * `1` keeps only the latest site.
   */
  maxEntries?: number;
}

/**
 * Keeps one assembler per normalized site so repeated requests reuse its
 * profile and candidate pool. A layer count drawn at random is not part of the
 * key and holds for as long as the assembler stays cached.
 */
export class GuildAssemblerCache {
  private readonly store = new Map<string, GuildAssembler>();
  private readonly maxEntries: number;

  constructor(
    private readonly plants: readonly PlantRecord[],
    private readonly options: GuildAssemblerCacheOptions = {}
  ) {
    this.maxEntries = Math.max(1, Math.floor(options.maxEntries ?? DEFAULT_MAX_ASSEMBLERS));
  }

  get(raw: RawSiteParams = {}): GuildAssembler {
    const site = normalizeSiteParams(raw);
    const key = siteKey(site);
    const cached = this.store.get(key);
    if (cached) {
      this.store.delete(key);
      this.store.set(key, cached);
      return cached;
    }

    const assembler = new GuildAssembler(this.plants, completeSiteProfile(site, this.options), this.options);
    this.store.set(key, assembler);
    this.evict();
    return assembler;
  }

  get size(): number {
    return this.store.size;
  }

  clear(): void {
    this.store.clear();
  }

  private evict(): void {
    const logger = this.options.logger ?? silentLogger;
    for (const key of this.store.keys()) {
      if (this.store.size <= this.maxEntries) {
        return;
      }
      this.store.delete(key);
      logger.debug({ key, size: this.store.size }, "Evicted cached guild assembler");
    }
  }
}

export const siteKey = ({ conditions, numLayers }: NormalizedSite): string =>
  JSON.stringify([
    conditions.zone,
    conditions.ph,
    conditions.sunTolerances[0],
    conditions.soilTextureClass,
    conditions.moistureBand,
    conditions.region,
    conditions.includeTrees,
    conditions.edibleOnly,
    conditions.perennialOnly,
    numLayers
  ]);
