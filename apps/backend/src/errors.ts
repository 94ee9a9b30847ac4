/** 100 years of minutes; keeps now + interval well inside the range a Date can hold. */
export const MAX_INTERVAL_MINUTES = 100 * 365 * 24 * 60;

export type SchedulerErrorCode =
  | "not_found"
  | "invalid_interval"
  | "duplicate_id"
  | "store_unavailable";

export class SchedulerError extends Error {
  readonly code: SchedulerErrorCode;

  constructor(code: SchedulerErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotFoundError extends SchedulerError {
  readonly jobId: string;

  constructor(jobId: string) {
    super("not_found", `Job ${jobId} not found`);
    this.jobId = jobId;
  }
}

export class InvalidIntervalError extends SchedulerError {
  readonly minutes: unknown;

  constructor(minutes: unknown) {
    super(
      "invalid_interval",
      `Invalid interval ${String(minutes)}: must be a positive whole number of minutes, at most ${MAX_INTERVAL_MINUTES}`,
    );
    this.minutes = minutes;
  }
}

export class DuplicateIdError extends SchedulerError {
  readonly jobId: string;

  constructor(jobId: string) {
    super("duplicate_id", `Job ${jobId} is already registered`);
    this.jobId = jobId;
  }
}

/** The metadata backend could not be reached; `cause` holds the backend error. */
export class StoreUnavailableError extends SchedulerError {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("store_unavailable", `Job store unavailable during ${operation}: ${detail}`, {
      cause,
    });
  }
}

export function isSchedulerError(err: unknown): err is SchedulerError {
  return err instanceof SchedulerError;
}

export function isValidInterval(minutes: unknown): minutes is number {
  return (
    typeof minutes === "number" &&
    Number.isInteger(minutes) &&
    minutes > 0 &&
    minutes <= MAX_INTERVAL_MINUTES
  );
}

/** Throws InvalidIntervalError unless `minutes` is a positive integer up to MAX_INTERVAL_MINUTES. */
export function assertValidInterval(minutes: unknown): asserts minutes is number {
  if (!isValidInterval(minutes)) throw new InvalidIntervalError(minutes);
}
