import { describe, it, expect } from "vitest";
import { DEFAULT_REFERENCE_BASE_URL, loadConfig } from "../src/index.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      plants: { path: undefined },
      logging: { level: "info" },
      reference: { baseUrl: DEFAULT_REFERENCE_BASE_URL }
    });
  });

  it("reads the environment", () => {
    const config = loadConfig({
      GUILD_PLANTS_PATH: "/data/plants.json",
      GUILD_LOG_LEVEL: "debug",
      GUILD_REFERENCE_BASE_URL: "https://plants.example.org/lookup"
    });
    expect(config).toEqual({
      plants: { path: "/data/plants.json" },
      logging: { level: "debug" },
      reference: { baseUrl: "https://plants.example.org/lookup" }
    });
  });

  it("treats empty variables as unset", () => {
    expect(loadConfig({ GUILD_PLANTS_PATH: "", GUILD_LOG_LEVEL: "" }).logging.level).toBe("info");
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ GUILD_LOG_LEVEL: "loud" })).toThrow();
  });
});
