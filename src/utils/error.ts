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

export enum HASH_VEC_ERROR {
  INDEX_OUT_OF_RANGE = "INDEX_OUT_OF_RANGE",
  KEY_ALREADY_EXISTS = "KEY_ALREADY_EXISTS",
  CONCURRENT_MODIFICATION = "CONCURRENT_MODIFICATION",
}

// Only a key collision is recoverable; the rest are caller bugs.
const OPERATIONAL: ReadonlySet<HASH_VEC_ERROR> = new Set([
  HASH_VEC_ERROR.KEY_ALREADY_EXISTS,
]);

export class HashVecError extends AppError {
  constructor(
    public readonly category: HASH_VEC_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, OPERATIONAL.has(category), context);
  }
}

export function is_hash_vec_error(error: unknown): error is HashVecError {
  return error instanceof HashVecError;
}
