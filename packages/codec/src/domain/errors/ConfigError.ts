import { ContractError } from "./ContractError";

export class ConfigError extends ContractError {
  constructor(message: string, details?: unknown) {
    super({ code: "CONFIG_ERROR", message, details });
    this.name = "ConfigError";
  }
}
