import { isGuildEngineError } from "../errors.js";
import { silentLogger } from "../logger.js";
import type { Guild } from "../schema.js";
import type { BatchFailure, BatchResult, GuildBatchOptions } from "./types.js";

/**
 * Runs several independent assemblies against one candidate pool. Engine
 * errors are recorded per attempt; anything else propagates.
 */
export class GuildBatchBuilder {
  constructor(private readonly options: GuildBatchOptions) {}

  async run(count: number): Promise<BatchResult> {
    const logger = this.options.logger ?? silentLogger;
    const result: BatchResult = { processed: 0, successes: 0, guilds: [], failures: [] };

    for (let attempt = 1; attempt <= count; attempt += 1) {
      result.processed += 1;
      let guild: Guild;
      try {
        guild = this.options.assembler.assemble(this.options.assembleInput);
      } catch (error: unknown) {
        if (!isGuildEngineError(error)) {
          throw error;
        }
        const failure: BatchFailure = { attempt, kind: error.kind, reason: error.message };
        logger.warn(failure, "Guild assembly failed");
        result.failures.push(failure);
        continue;
      }

      result.guilds.push(guild);
      result.successes += 1;
      if (this.options.onGuildGenerated) {
        await this.options.onGuildGenerated({ attempt, guild });
      }
    }

    return result;
  }
}
