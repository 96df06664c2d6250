import StackUtils from "stack-utils";

const stackUtils = new StackUtils({ cwd: process.cwd(), internals: StackUtils.nodeInternals() });

export type ErrorTags = {
  errorCause?: string;
  errorCode?: string;
  errorMessage: string;
  errorName: string;
  errorStack: string;
  status?: number;
  system?: string;
  url?: string;
};

/**
 * Flattens an error into log fields. Download failures carry `code`, `status` and `url`,
 * unsupported hosts carry `system`, and undici reports network failures as a
 * "fetch failed" TypeError whose `cause` holds the socket or DNS error.
 */
export function formatError(error: Error): ErrorTags {
  const tags: ErrorTags = {
    errorMessage: error.message,
    errorName: error.name,
    errorStack: stackUtils.clean(error.stack ?? ""),
  };

  if ("code" in error && typeof error.code === "string") {
    tags.errorCode = error.code;
  }
  if ("status" in error && typeof error.status === "number") {
    tags.status = error.status;
  }
  if ("system" in error && typeof error.system === "string") {
    tags.system = error.system;
  }
  if ("url" in error && typeof error.url === "string") {
    tags.url = error.url;
  }

  const { cause } = error;
  if (cause instanceof Error) {
    tags.errorCause =
      "code" in cause && typeof cause.code === "string"
        ? `${cause.code}: ${cause.message}`
        : cause.message;
  }

  return tags;
}
