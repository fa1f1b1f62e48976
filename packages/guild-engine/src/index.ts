export * from "./schema.js";
export * from "./errors.js";
export * from "./config.js";
export * from "./logger.js";
export * from "./site/site-profile.js";
export * from "./site/soil-texture.js";
export * from "./engine/sampling.js";
export * from "./engine/traits.js";
export * from "./engine/candidate-pool.js";
export * from "./engine/guild-assembler.js";
export * from "./storage/types.js";
export * from "./storage/plant-record.schemas.js";
export * from "./storage/memory-storage.js";
export * from "./storage/json-file-storage.js";
export * from "./session/assembler-cache.js";
export * from "./batch/types.js";
export * from "./batch/builder.js";
export * from "./cli/runner.js";
