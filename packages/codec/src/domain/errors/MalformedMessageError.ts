import { ContractError } from "./ContractError";

export class MalformedMessageError extends ContractError {
  public readonly offset?: number;

  constructor(message: string, offset?: number, cause?: unknown) {
    super({
      code: "MALFORMED_MESSAGE",
      message,
      details: offset === undefined ? undefined : { offset },
      cause,
    });
    this.name = "MalformedMessageError";
    this.offset = offset;
  }
}
