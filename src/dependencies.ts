import { OPEN_INCIDENT_STATUSES, type RemoteSchedule, type ScheduleGateway } from "./client.types.js";
import { ScheduleOperationError, describeError, isTransientRemoteError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { retry, RETRY_TIMEOUTS, type Clock } from "./retry.js";

export interface DependencyScanOptions {
  logger?: Logger;
  clock?: Clock;
  /** Pause between attempts. */
  retryIntervalMs?: number;
  /** Deadline for each lookup. Defaults to {@link RETRY_TIMEOUTS.lookup}. */
  timeoutMs?: number;
}

/**
 * What depends on a schedule.
 */
export interface ScheduleDependencies {
  /** Escalation policies that reference the schedule. */
  escalationPolicyIds: string[];
  /** Links to open incidents on the schedule's teams. */
  openIncidentUrls: string[];
}

const lookup = <T>(
  operation: () => Promise<T>,
  action: string,
  resourceId: string,
  options: DependencyScanOptions,
): Promise<T> => {
  const logger = options.logger ?? silentLogger;
  return retry(operation, {
    timeoutMs: options.timeoutMs ?? RETRY_TIMEOUTS.lookup,
    intervalMs: options.retryIntervalMs,
    isRetryable: isTransientRemoteError,
    clock: options.clock,
    onRetry: (error, attempt) =>
      logger.debug(`Retrying: ${action}`, { resourceId, attempt, error: describeError(error) }),
  }).catch((error: unknown) => {
    throw new ScheduleOperationError(action, resourceId, error);
  });
};

const fetchSchedule = (
  gateway: ScheduleGateway,
  scheduleId: string,
  options: DependencyScanOptions,
): Promise<RemoteSchedule> =>
  lookup(() => gateway.getSchedule(scheduleId), "Reading schedule", scheduleId, options);

const escalationPolicyIdsOf = (schedule: RemoteSchedule): string[] => [
  ...new Set(schedule.escalation_policies.map((policy) => policy.id)),
];

/**
 * Lists incidents that may have escalated through the schedule.
 *
 * The API has no schedule-to-incident link, so open incidents of the
 * schedule's teams stand in for it. This over-reports incidents of the same
 * teams that never involved the schedule, and misses incidents of teams the
 * schedule is not associated with.
 *
 * A schedule without teams skips the query and reports nothing. This departs
 * from a plain team-filtered query: with an empty team filter the API lists
 * every open incident on the account, which would block deleting any
 * team-less schedule while an unrelated incident is open.
 */
const openIncidentUrlsOf = async (
  gateway: ScheduleGateway,
  schedule: RemoteSchedule,
  options: DependencyScanOptions,
): Promise<string[]> => {
  const teamIds = schedule.teams.map((team) => team.id);
  if (teamIds.length === 0) return [];

  const incidents = await lookup(
    () =>
      gateway.listOpenIncidents({
        teamIds,
        statuses: OPEN_INCIDENT_STATUSES,
        dateRange: "all",
      }),
    "Listing open incidents for schedule",
    schedule.id,
    options,
  );

  return incidents
    .filter((incident) => incident.status !== "resolved")
    .map((incident) => incident.html_url);
};

/**
 * IDs of the escalation policies that use a schedule.
 *
 * @category Dependencies
 */
export async function findEscalationPolicies(
  gateway: ScheduleGateway,
  scheduleId: string,
  options: DependencyScanOptions = {},
): Promise<string[]> {
  return escalationPolicyIdsOf(await fetchSchedule(gateway, scheduleId, options));
}

/**
 * Links to the triggered or acknowledged incidents of a schedule's teams.
 *
 * @category Dependencies
 */
export async function findOpenIncidents(
  gateway: ScheduleGateway,
  scheduleId: string,
  options: DependencyScanOptions = {},
): Promise<string[]> {
  return openIncidentUrlsOf(gateway, await fetchSchedule(gateway, scheduleId, options), options);
}

/**
 * Both lookups, reading the schedule once.
 *
 * @category Dependencies
 */
export async function scanDependencies(
  gateway: ScheduleGateway,
  scheduleId: string,
  options: DependencyScanOptions = {},
): Promise<ScheduleDependencies> {
  const schedule = await fetchSchedule(gateway, scheduleId, options);
  return {
    escalationPolicyIds: escalationPolicyIdsOf(schedule),
    openIncidentUrls: await openIncidentUrlsOf(gateway, schedule, options),
  };
}
