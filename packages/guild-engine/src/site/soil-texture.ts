import { SOIL_TEXTURE_CLASSES, type SoilTextureClass } from "../schema.js";

/**
 * Soil texture triangle categories grouped into the three classes plant
 * records are tagged with. Names are stored normalized (lower case, single
 * spaces).
 */
export const SOIL_TEXTURE_NAMES: Readonly<Record<SoilTextureClass, readonly string[]>> = {
  coarse: [
    "coarse",
    "sand",
    "coarse sand",
    "fine sand",
    "loamy coarse sand",
    "loamy fine sand",
    "loamy very fine sand",
    "very fine sand",
    "loamy sand"
  ],
  medium: [
    "medium",
    "silt",
    "sandy clay loam",
    "very fine sandy loam",
    "silty clay loam",
    "silt loam",
    "loam",
    "fine sandy loam",
    "sandy loam",
    "coarse sandy loam",
    "clay loam"
  ],
  fine: ["fine", "sandy clay", "silty clay", "clay"]
};

export const normalizeTerm = (value: string): string =>
  value.toLowerCase().replace(/[\s_-]+/g, " ").trim();

export const matchSoilTexture = (input: string): SoilTextureClass | undefined => {
  const normalized = normalizeTerm(input);
  return SOIL_TEXTURE_CLASSES.find((textureClass) => SOIL_TEXTURE_NAMES[textureClass].includes(normalized));
};

export const soilTextureTrait = (textureClass: SoilTextureClass): string => `${textureClass} soil`;
