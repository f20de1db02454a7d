export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum ARENA_ERROR {
  INDEX_SLOT_OVERFLOW = "INDEX_SLOT_OVERFLOW",
  INDEX_GENERATION_OVERFLOW = "INDEX_GENERATION_OVERFLOW",
  INDEX_RAW_OUT_OF_RANGE = "INDEX_RAW_OUT_OF_RANGE",
  CONCURRENT_MODIFICATION = "CONCURRENT_MODIFICATION",
  FREE_LIST_CORRUPTED = "FREE_LIST_CORRUPTED",
}

export class ArenaError extends AppError {
  constructor(
    public readonly category: ARENA_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_arena_error(error: unknown): error is ArenaError {
  return error instanceof ArenaError;
}
