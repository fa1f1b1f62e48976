import { z } from "zod";

export const DEFAULT_REFERENCE_BASE_URL = "https://pfaf.org/user/Plant.aspx";

const ConfigSchema = z.object({
  plants: z.object({
    path: z.string().min(1).optional()
  }),
  logging: z.object({
    level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
  }),
  reference: z.object({
    baseUrl: z.string().url().default(DEFAULT_REFERENCE_BASE_URL)
  })
});

export type GuildEngineConfig = z.infer<typeof ConfigSchema>;

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): GuildEngineConfig =>
  ConfigSchema.parse({
    plants: {
      path: env.GUILD_PLANTS_PATH || undefined
    },
    logging: {
      level: env.GUILD_LOG_LEVEL || undefined
    },
    reference: {
      baseUrl: env.GUILD_REFERENCE_BASE_URL || undefined
    }
  });
