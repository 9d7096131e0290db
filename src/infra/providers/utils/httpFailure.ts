import type { AppBoundaryFailureReason } from "../../../core/entities/appError";
import type { HttpClientError } from "../../http/httpJsonClient";

/**
 * Maps shared HTTP client failures onto boundary reasons so every adapter reports them the same way.
 */
export const toFailureReason = (
  failure: HttpClientError,
): AppBoundaryFailureReason => {
  switch (failure.code) {
    case "timeout":
      return "timeout";
    case "invalid_json":
      return "invalid_json";
    case "transport_error":
      return "transport_error";
    case "non_success_status":
      if (failure.httpStatus === 429) {
        return "rate_limited";
      }

      if (failure.httpStatus === 401 || failure.httpStatus === 403) {
        return "auth_invalid";
      }

      return "provider_error";
  }
};
