export type AppchainErrorCode =
  /* stream decoding */
  | "MalformedStream"
  | "UnsupportedMode"
  /* state transition */
  | "InvalidBlockNumber"
  | "InvalidPreviousBlockNumber"
  | "InvalidPreviousBlockHash"
  | "InvalidPreviousRoot"
  /* host checks */
  | "InvalidConfigHash"
  | "InvalidFact"
  | "Unauthorized"
  /* infra */
  | "MalformedSnapshot"
  | "InvalidConfig";

export class AppchainError extends Error {
  readonly code: AppchainErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: AppchainErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(`${code}: ${message}`);
    this.name = "AppchainError";
    this.code = code;
    this.details = details;
  }
}

export const isAppchainError = (
  err: unknown,
  code?: AppchainErrorCode,
): err is AppchainError =>
  err instanceof AppchainError && (code === undefined || err.code === code);

export function fail(
  code: AppchainErrorCode,
  message: string,
  details?: Record<string, unknown>,
): never {
  throw new AppchainError(code, message, details);
}
