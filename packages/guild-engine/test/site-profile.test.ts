import { describe, it, expect } from "vitest";
import {
  InvalidParameterError,
  PH_BANDS,
  SUN_LEVELS,
  buildSiteProfile,
  classifySoilTexture,
  normalizeMoistureBand,
  phToBand,
  sunTolerancesFrom,
  zoneToMinTemperatureF
} from "../src/index.js";
import { constantRandom } from "./helpers/plants.js";

describe("phToBand", () => {
  it("uses half-open boundaries", () => {
    expect(phToBand(4.4)).toBe("extremely acid");
    expect(phToBand(4.5)).toBe("very strongly acid");
    expect(phToBand(5.1)).toBe("strongly acid");
    expect(phToBand(5.6)).toBe("moderately acid");
    expect(phToBand(6.1)).toBe("slightly acid");
    expect(phToBand(6.5)).toBe("slightly acid");
    expect(phToBand(6.6)).toBe("neutral");
    expect(phToBand(7.3)).toBe("neutral");
    expect(phToBand(7.4)).toBe("slightly alkaline");
    expect(phToBand(7.9)).toBe("moderately alkaline");
    expect(phToBand(8.5)).toBe("strongly alkaline");
    expect(phToBand(9.0)).toBe("strongly alkaline");
  });

  it("clamps out-of-range values to the terminal bands", () => {
    expect(phToBand(2)).toBe("extremely acid");
    expect(phToBand(11.2)).toBe("strongly alkaline");
  });

  it("maps every value in 3.5..9.0 to a known band, never moving to a more acid band", () => {
    let previous = -1;
    for (let tenths = 35; tenths <= 90; tenths += 1) {
      const index = PH_BANDS.indexOf(phToBand(tenths / 10));
      expect(index).toBeGreaterThanOrEqual(0);
      expect(index).toBeGreaterThanOrEqual(previous);
      previous = index;
    }
  });
});

describe("sunTolerancesFrom", () => {
  it("truncates the list at the chosen level", () => {
    expect(sunTolerancesFrom("partial shade to full shade")).toEqual([
      "partial shade to full shade",
      "full shade"
    ]);
  });

  it("starts every list with the requested level", () => {
    for (const level of SUN_LEVELS) {
      const tolerances = sunTolerancesFrom(level);
      expect(tolerances[0]).toBe(level);
      expect(tolerances).toEqual(SUN_LEVELS.slice(SUN_LEVELS.indexOf(level)));
    }
  });

  it("matches case-insensitively", () => {
    expect(sunTolerancesFrom("Full Sun")).toHaveLength(5);
  });

  it("rejects unknown levels", () => {
    expect(() => sunTolerancesFrom("moonlight")).toThrow(InvalidParameterError);
  });
});

describe("classifySoilTexture", () => {
  it("maps texture triangle names to classes", () => {
    expect(classifySoilTexture("loamy fine sand")).toBe("coarse");
    expect(classifySoilTexture("Silty Clay Loam")).toBe("medium");
    expect(classifySoilTexture("silty_clay")).toBe("fine");
    expect(classifySoilTexture("fine  sand")).toBe("coarse");
    expect(classifySoilTexture("medium")).toBe("medium");
  });

  it("rejects unknown textures with the parameter name", () => {
    let caught: unknown;
    try {
      classifySoilTexture("gravel");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvalidParameterError);
    expect(caught).toMatchObject({ parameter: "soilTexture", kind: "InvalidParameter" });
  });
});

describe("normalizeMoistureBand", () => {
  it("accepts hyphenated and capitalized forms", () => {
    expect(normalizeMoistureBand("Wet-Mesic")).toBe("wet mesic");
    expect(normalizeMoistureBand("dry_mesic")).toBe("dry mesic");
  });

  it("rejects unknown bands", () => {
    expect(() => normalizeMoistureBand("soggy")).toThrow(InvalidParameterError);
  });
});

describe("zoneToMinTemperatureF", () => {
  it("follows the hardiness table", () => {
    expect(zoneToMinTemperatureF(1)).toBe(-60);
    expect(zoneToMinTemperatureF(7)).toBe(0);
    expect(zoneToMinTemperatureF(10)).toBe(30);
  });
});

describe("buildSiteProfile", () => {
  it("normalizes raw parameters", () => {
    const profile = buildSiteProfile({
      zone: 5,
      ph: 7.0,
      sun: "partial or dappled shade",
      soilTexture: "clay",
      water: "wet mesic",
      region: "Midwest",
      includeTrees: false,
      edibleOnly: true,
      perennialOnly: false,
      numLayers: 3
    });

    expect(profile).toEqual({
      zone: 5,
      minTemperatureF: -20,
      ph: 7.0,
      phBand: "neutral",
      sunTolerances: ["partial or dappled shade", "partial shade to full shade", "full shade"],
      soilTextureClass: "fine",
      moistureBand: "wet mesic",
      region: "midwest",
      includeTrees: false,
      edibleOnly: true,
      perennialOnly: false,
      numLayers: 3
    });
    expect(Object.isFrozen(profile)).toBe(true);
  });

  it("applies defaults", () => {
    const profile = buildSiteProfile({ numLayers: 4 });
    expect(profile.zone).toBe(7);
    expect(profile.phBand).toBe("slightly acid");
    expect(profile.moistureBand).toBe("mesic");
    expect(profile.soilTextureClass).toBe("medium");
    expect(profile.region).toBe("all");
    expect(profile.includeTrees).toBe(true);
    expect(profile.perennialOnly).toBe(true);
    expect(profile.edibleOnly).toBe(false);
  });

  it("draws the layer count uniformly when none is given", () => {
    expect(buildSiteProfile({}, { random: constantRandom(0) }).numLayers).toBe(2);
    expect(buildSiteProfile({}, { random: constantRandom(0.5) }).numLayers).toBe(5);
    expect(buildSiteProfile({ numLayers: null }, { random: constantRandom(0.999) }).numLayers).toBe(7);
  });

  it("rejects layer counts outside 2..7", () => {
    expect(() => buildSiteProfile({ numLayers: 1 })).toThrow(InvalidParameterError);
    expect(() => buildSiteProfile({ numLayers: 8 })).toThrow(/Invalid numLayers/);
  });

  it("rejects zones outside 1..10", () => {
    expect(() => buildSiteProfile({ zone: 11 })).toThrow(/Invalid zone/);
  });

  it("rejects unknown sun levels and regions", () => {
    expect(() => buildSiteProfile({ sun: "twilight" })).toThrow(/Invalid sun/);
    expect(() => buildSiteProfile({ region: "arctic" })).toThrow(/Invalid region/);
  });

  it("rejects a non-numeric pH", () => {
    expect(() => buildSiteProfile({ ph: Number.NaN })).toThrow(InvalidParameterError);
  });
});
