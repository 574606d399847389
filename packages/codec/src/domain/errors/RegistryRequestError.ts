import { ContractError } from "./ContractError";

export class RegistryRequestError extends ContractError {
  public readonly status: number;

  constructor(status: number, message: string) {
    super({
      code: "REGISTRY_REQUEST",
      message,
      details: { status },
    });
    this.name = "RegistryRequestError";
    this.status = status;
  }
}
