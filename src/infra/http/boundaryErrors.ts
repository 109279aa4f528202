import type {
  AppBoundaryError,
  AppBoundarySource,
} from "../../core/entities/appError";
import type { HttpClientError } from "./httpJsonClient";

const mapHttpCode = (failure: HttpClientError): AppBoundaryError["code"] => {
  if (failure.httpStatus === 429) {
    return "rate_limited";
  }

  if (failure.httpStatus === 401 || failure.httpStatus === 403) {
    return "auth_invalid";
  }

  if (failure.code === "timeout") {
    return "timeout";
  }

  if (failure.code === "invalid_json") {
    return "invalid_json";
  }

  if (failure.code === "transport_error") {
    return "transport_error";
  }

  return "provider_error";
};

/**
 * Lifts a transport-level failure into the boundary error contract shared by every adapter.
 */
export const toBoundaryError = (
  source: AppBoundarySource,
  provider: string,
  failure: HttpClientError,
): AppBoundaryError => {
  const code = mapHttpCode(failure);

  return {
    source,
    code,
    provider,
    message: failure.message,
    // A rejected credential stays rejected however often it is retried.
    retryable: code === "auth_invalid" ? false : failure.retryable,
    httpStatus: failure.httpStatus,
    cause: failure.responseBody ?? failure.cause,
  };
};
