/**
 * Engine errors.
 *
 * - TopologyError: malformed board definition, raised while building a graph.
 * - IllegalMoveError: `applyMove` received a move outside `generateLegalMoves`.
 *   The caller can re-prompt; the state is never touched.
 * - PreconditionError: the caller asked for something the current state
 *   cannot provide (a move from a finished game, a move with no legal moves).
 * - ConfigError: a game config, NPC profile or save file failed validation.
 */
import type { ZodError } from "zod";
import type { Move } from "./moveTypes.ts";

export type DabloErrorCode =
  | "TOPOLOGY_INVALID"
  | "ILLEGAL_MOVE"
  | "PRECONDITION_FAILED"
  | "CONFIG_INVALID";

export class DabloError extends Error {
  readonly code: DabloErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: DabloErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "DabloError";
    this.code = code;
    this.details = details;
  }
}

export class TopologyError extends DabloError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("TOPOLOGY_INVALID", message, details);
    this.name = "TopologyError";
  }
}

export class IllegalMoveError extends DabloError {
  readonly move: Move;

  constructor(move: Move, message: string, details?: Record<string, unknown>) {
    super("ILLEGAL_MOVE", message, details);
    this.name = "IllegalMoveError";
    this.move = move;
  }
}

export class PreconditionError extends DabloError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PRECONDITION_FAILED", message, details);
    this.name = "PreconditionError";
  }
}

export class ConfigError extends DabloError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CONFIG_INVALID", message, details);
    this.name = "ConfigError";
  }
}

export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

export function isDabloError(err: unknown): err is DabloError {
  return err instanceof DabloError;
}
