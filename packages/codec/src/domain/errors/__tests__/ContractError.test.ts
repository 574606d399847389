import { describe, expect, it } from "vitest";
import { ContractError, asContractError } from "../ContractError";
import { RegistryUnavailableError } from "../RegistryUnavailableError";

describe("asContractError", () => {
  it("returns library errors as they are", () => {
    const error = new RegistryUnavailableError("Registry request GET /schemas/ids/1 failed");
    expect(asContractError(error)).toBe(error);
  });

  it("wraps other errors as internal, keeping the cause", () => {
    const cause = new TypeError("boom");
    const error = asContractError(cause);

    expect(error).toBeInstanceOf(ContractError);
    expect(error).toMatchObject({ code: "INTERNAL_ERROR", message: "boom", retryable: false, cause });
  });

  it("wraps thrown non-errors with the value in details", () => {
    expect(asContractError("nope")).toMatchObject({
      code: "INTERNAL_ERROR",
      message: "Unknown error",
      details: "nope",
    });
  });
});
