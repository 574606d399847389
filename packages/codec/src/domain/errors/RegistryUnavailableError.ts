import { ContractError } from "./ContractError";

export class RegistryUnavailableError extends ContractError {
  constructor(message: string, cause?: unknown, status?: number) {
    super({
      code: "REGISTRY_UNAVAILABLE",
      message,
      retryable: true,
      details: status === undefined ? undefined : { status },
      cause,
    });
    this.name = "RegistryUnavailableError";
  }
}
