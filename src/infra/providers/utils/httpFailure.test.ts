import { describe, expect, it } from "vitest";
import { toFailureReason } from "./httpFailure";

describe("toFailureReason", () => {
  it("maps status codes onto rate limit, auth and generic provider reasons", () => {
    expect(
      toFailureReason({
        code: "non_success_status",
        message: "",
        httpStatus: 429,
      }),
    ).toBe("rate_limited");
    expect(
      toFailureReason({
        code: "non_success_status",
        message: "",
        httpStatus: 403,
      }),
    ).toBe("auth_invalid");
    expect(
      toFailureReason({
        code: "non_success_status",
        message: "",
        httpStatus: 404,
      }),
    ).toBe("provider_error");
  });

  it("passes client failure codes through", () => {
    expect(toFailureReason({ code: "timeout", message: "" })).toBe("timeout");
    expect(toFailureReason({ code: "invalid_json", message: "" })).toBe(
      "invalid_json",
    );
    expect(toFailureReason({ code: "transport_error", message: "" })).toBe(
      "transport_error",
    );
  });
});
