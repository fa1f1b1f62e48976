import type { GuildErrorKind } from "../errors.js";
import type { AssembleInput, GuildAssembler } from "../engine/guild-assembler.js";
import type { Logger } from "../logger.js";
import type { Guild } from "../schema.js";

export interface GuildBatchOptions {
  assembler: GuildAssembler;
  logger?: Logger;
  /**
   * Passed to every `assemble()` call; pins `generatedAt` for reproducible output.
   */
  assembleInput?: AssembleInput;
  onGuildGenerated?: (context: { attempt: number; guild: Guild }) => void | Promise<void>;
}

export interface BatchFailure {
  attempt: number;
  kind: GuildErrorKind;
  reason: string;
}

export interface BatchResult {
  processed: number;
  successes: number;
  guilds: Guild[];
  failures: BatchFailure[];
}
