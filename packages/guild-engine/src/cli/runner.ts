import { z } from "zod";
import { GuildBatchBuilder } from "../batch/builder.js";
import type { BatchFailure } from "../batch/types.js";
import { loadConfig } from "../config.js";
import { GuildEngineError, type GuildErrorKind } from "../errors.js";
import { GuildAssembler } from "../engine/guild-assembler.js";
import type { RandomSource } from "../engine/sampling.js";
import { createLogger, type Logger } from "../logger.js";
import type { Guild } from "../schema.js";
import { buildSiteProfile, type SiteProfile } from "../site/site-profile.js";
import { createJsonFilePlantStore } from "../storage/json-file-storage.js";

export const RunnerInputSchema = z.object({
  plantsPath: z.string().min(1).optional(),
  site: z.record(z.string(), z.unknown()).default({}),
  count: z.number().int().min(1).max(100).default(1),
  generatedAt: z.string().datetime().optional()
});

export type RunnerOutput =
  | {
      ok: true;
      profile: SiteProfile;
      guilds: Guild[];
      failures: BatchFailure[];
    }
  | {
      ok: false;
      error: string;
      kind?: GuildErrorKind;
    };

export interface RunnerIO {
  /**
   * Receives the single JSON output line, newline included.
   */
  write: (line: string) => void;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  random?: RandomSource;
}

export const failureOutput = (error: unknown): RunnerOutput => ({
  ok: false,
  error: error instanceof Error ? error.message : String(error),
  kind: error instanceof GuildEngineError ? error.kind : undefined
});

const execute = async (raw: string, io: RunnerIO): Promise<RunnerOutput> => {
  const config = loadConfig(io.env ?? process.env);
  const logger = io.logger ?? createLogger({ level: config.logging.level });

  let json: unknown;
  try {
    json = raw.trim() ? JSON.parse(raw) : {};
  } catch (error) {
    return failureOutput(new Error(`Invalid JSON input: ${error instanceof Error ? error.message : String(error)}`));
  }

  const input = RunnerInputSchema.safeParse(json);
  if (!input.success) {
    return failureOutput(new Error(`Invalid input: ${input.error.issues[0]?.message ?? "unknown issue"}`));
  }

  const plantsPath = input.data.plantsPath ?? config.plants.path;
  if (!plantsPath) {
    return failureOutput(new Error("plantsPath is required (or set GUILD_PLANTS_PATH)"));
  }

  const profile = buildSiteProfile(input.data.site, { random: io.random });
  const plants = await createJsonFilePlantStore({ path: plantsPath, logger }).list();
  const assembler = new GuildAssembler(plants, profile, {
    logger,
    random: io.random,
    referenceBaseUrl: config.reference.baseUrl
  });

  const result = await new GuildBatchBuilder({
    assembler,
    logger,
    assembleInput: { generatedAt: input.data.generatedAt }
  }).run(input.data.count);

  if (result.successes === 0) {
    const first = result.failures[0];
    return { ok: false, error: first?.reason ?? "No guild assembled", kind: first?.kind };
  }

  return { ok: true, profile, guilds: result.guilds, failures: result.failures };
};

/**
 * Runs one request and writes one JSON line. Resolves to the exit code.
 */
export async function runGuildEngine(raw: string, io: RunnerIO): Promise<number> {
  let output: RunnerOutput;
  try {
    output = await execute(raw, io);
  } catch (error) {
    output = failureOutput(error);
  }
  io.write(`${JSON.stringify(output)}\n`);
  return output.ok ? 0 : 1;
}
