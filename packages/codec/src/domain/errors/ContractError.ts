export type ErrorCode =
  | "VALIDATION_ERROR"
  | "MALFORMED_MESSAGE"
  | "SCHEMA_MISMATCH"
  | "UNKNOWN_SCHEMA"
  | "INCOMPATIBLE_SCHEMA"
  | "SCHEMA_DEFINITION"
  | "REGISTRY_UNAVAILABLE"
  | "REGISTRY_REQUEST"
  | "CONFIG_ERROR"
  | "INTERNAL_ERROR";

export interface ContractErrorParams {
  code: ErrorCode;
  message: string;
  retryable?: boolean;
  details?: unknown;
  cause?: unknown;
}

/**
 * Base class of every error the library raises.
 *
 * `retryable` is true only for transient registry failures; everything else
 * needs a data or schema change before the same call can succeed.
 */
export class ContractError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;
  public readonly details?: unknown;

  constructor(params: ContractErrorParams) {
    super(
      params.message,
      params.cause === undefined ? undefined : { cause: params.cause }
    );
    this.name = "ContractError";
    this.code = params.code;
    this.retryable = params.retryable ?? false;
    this.details = params.details;
  }
}

export function asContractError(err: unknown): ContractError {
  if (err instanceof ContractError) {
    return err;
  }

  if (err instanceof Error) {
    return new ContractError({
      code: "INTERNAL_ERROR",
      message: err.message,
      cause: err,
    });
  }

  return new ContractError({
    code: "INTERNAL_ERROR",
    message: "Unknown error",
    details: err,
  });
}
