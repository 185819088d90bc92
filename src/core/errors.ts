export type FetchErrorCode =
  | "unauthorized"
  | "not_found"
  | "request_rejected"
  | "invalid_response"
  | "retries_exhausted";

export class FetchError extends Error {
  readonly code: FetchErrorCode;
  readonly status?: number;
  readonly requestUrl?: string;
  readonly cause?: unknown;

  constructor(args: { code: FetchErrorCode; message: string; status?: number; requestUrl?: string; cause?: unknown }) {
    super(args.message);
    this.name = "FetchError";
    this.code = args.code;
    this.status = args.status;
    this.requestUrl = args.requestUrl;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type DeviceSessionErrorCategory = "connect" | "auth" | "load" | "commit";

export class DeviceSessionError extends Error {
  readonly category: DeviceSessionErrorCategory;
  readonly cause?: unknown;

  constructor(category: DeviceSessionErrorCategory, message: string, cause?: unknown) {
    super(message);
    this.name = "DeviceSessionError";
    this.category = category;
    this.cause = cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Raised between protocol steps once the run has been aborted. */
export class RunAbortedError extends Error {
  readonly code = "run_aborted";

  constructor(message = "aborted by shutdown signal") {
    super(message);
    this.name = "RunAbortedError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};
