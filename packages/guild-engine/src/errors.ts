import type { GuildLayer } from "./schema.js";

export type GuildErrorKind = "InvalidParameter" | "InsufficientLayers" | "NoCandidate";

export class GuildEngineError extends Error {
  constructor(readonly kind: GuildErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidParameterError extends GuildEngineError {
  constructor(readonly parameter: string, message: string) {
    super("InvalidParameter", `Invalid ${parameter}: ${message}`);
  }
}

export class InsufficientLayersError extends GuildEngineError {
  constructor(readonly requested: number, readonly available: number) {
    super("InsufficientLayers", `Requested ${requested} layers but only ${available} are available`);
  }
}

export class NoCandidateError extends GuildEngineError {
  constructor(readonly layer: GuildLayer) {
    super("NoCandidate", `No candidate plants for the ${layer} layer`);
  }
}

export const isGuildEngineError = (error: unknown): error is GuildEngineError =>
  error instanceof GuildEngineError;
