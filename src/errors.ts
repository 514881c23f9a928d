/**
 * Error thrown when the scheduling API answers with a non-2xx status.
 *
 * Carries the HTTP status, the raw response body and the `errors` list of the
 * API's error envelope, which is what conflict detection matches on.
 *
 * @category Errors
 */
export class RemoteApiError extends Error {
  public readonly status: number;
  public readonly data: unknown;
  public readonly errors: readonly string[];

  constructor(message: string, status: number, data: unknown, errors: readonly string[] = []) {
    super(message);
    this.name = "RemoteApiError";
    this.status = status;
    this.data = data;
    this.errors = errors;
  }
}

/**
 * Error thrown when a request never produced an HTTP response.
 *
 * @category Errors
 */
export class NetworkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NetworkError";
  }
}

/**
 * Error thrown when a declared schedule is rejected before any remote call.
 *
 * @category Errors
 */
export class ScheduleValidationError extends Error {
  public readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(issues.length === 1 ? (issues[0] ?? "") : `Invalid schedule:\n${issues.join("\n")}`);
    this.name = "ScheduleValidationError";
    this.issues = issues;
  }
}

/**
 * A timestamp that could not be parsed as RFC 3339.
 *
 * @category Errors
 */
export class InvalidTimestampError extends ScheduleValidationError {
  public readonly value: string;

  constructor(value: string) {
    super([`"${value}" is not a valid RFC 3339 timestamp`]);
    this.name = "InvalidTimestampError";
    this.value = value;
  }
}

/**
 * Deletion refused because open incidents still depend on the schedule.
 *
 * The incidents are never resolved automatically.
 *
 * @category Errors
 */
export class BlockedByOpenIncidentsError extends Error {
  public readonly scheduleId: string;
  public readonly incidentUrls: readonly string[];

  constructor(scheduleId: string, incidentUrls: readonly string[]) {
    const links = incidentUrls.map((url) => `\n${url}`).join("");
    super(
      `Before removing schedule "${scheduleId}" you must first resolve the following incidents ` +
        `related to escalation policies using this schedule:${links}`,
    );
    this.name = "BlockedByOpenIncidentsError";
    this.scheduleId = scheduleId;
    this.incidentUrls = incidentUrls;
  }
}

/**
 * A remote failure annotated with the action and resource it happened on.
 *
 * @category Errors
 */
export class ScheduleOperationError extends Error {
  public readonly action: string;
  public readonly resourceId: string;

  constructor(action: string, resourceId: string, cause: unknown) {
    super(`${action} "${resourceId}": ${describeError(cause)}`, { cause });
    this.name = "ScheduleOperationError";
    this.action = action;
    this.resourceId = resourceId;
  }
}

/**
 * The escalation-policy workaround failed after a conflicting delete.
 *
 * `original` is the delete error that triggered the workaround; `cause` is
 * the failure of the workaround itself.
 *
 * @category Errors
 */
export class CompensationError extends Error {
  public readonly original: unknown;

  constructor(original: unknown, cause: unknown) {
    super(`${describeError(original)}; ${describeError(cause)}`, { cause });
    this.name = "CompensationError";
    this.original = original;
  }
}

/** Returns true for 404 responses. */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof RemoteApiError && error.status === 404;
}

/**
 * Returns true for failures worth retrying: transport errors, rate limiting
 * and server-side errors.
 */
export function isTransientRemoteError(error: unknown): boolean {
  if (error instanceof NetworkError) return true;
  if (error instanceof ScheduleOperationError) return isTransientRemoteError(error.cause);
  if (!(error instanceof RemoteApiError)) return false;
  return error.status === 429 || error.status >= 500;
}

/** Unwraps operation context to reach the underlying API error, if any. */
export function rootRemoteError(error: unknown): RemoteApiError | undefined {
  if (error instanceof RemoteApiError) return error;
  if (error instanceof ScheduleOperationError) return rootRemoteError(error.cause);
  return undefined;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
