import type {
  EscalationPolicy,
  EscalationRule,
  EscalationTarget,
  ScheduleGateway,
} from "./client.types.js";
import { scanDependencies } from "./dependencies.js";
import {
  BlockedByOpenIncidentsError,
  CompensationError,
  ScheduleOperationError,
  describeError,
  isNotFoundError,
  isTransientRemoteError,
  rootRemoteError,
} from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { retry, RETRY_TIMEOUTS, type Clock } from "./retry.js";

/** The only error the service lists when a schedule is still referenced. */
export const SCHEDULE_IN_USE_MESSAGE =
  "Schedule can't be deleted if it's being used by escalation policies";

export interface DeleteScheduleOptions {
  logger?: Logger;
  clock?: Clock;
  retryIntervalMs?: number;
  /** Deadline of the delete loop. Defaults to {@link RETRY_TIMEOUTS.write}. */
  timeoutMs?: number;
  /** Deadline of each dependency lookup. Defaults to {@link RETRY_TIMEOUTS.lookup}. */
  lookupTimeoutMs?: number;
}

/**
 * Recognizes the delete failure caused by escalation policies still
 * targeting the schedule: a 400 whose error list is exactly
 * {@link SCHEDULE_IN_USE_MESSAGE}.
 *
 * @category Deletion
 */
export function isScheduleInUseByEscalationPoliciesConflict(error: unknown): boolean {
  const remote = rootRemoteError(error);
  if (!remote || remote.status !== 400) return false;
  return remote.errors.length === 1 && remote.errors[0] === SCHEDULE_IN_USE_MESSAGE;
}

function targetsSchedule(target: EscalationTarget, scheduleId: string): boolean {
  switch (target.type) {
    case "schedule_reference":
      return target.id === scheduleId;
    case "user_reference":
      return false;
    default: {
      const unknownTarget: never = target;
      throw new Error(`Unknown escalation target ${JSON.stringify(unknownTarget)}`);
    }
  }
}

/**
 * Removes a schedule from an escalation policy's rules.
 *
 * A rule that only targets the schedule is dropped entirely, since a rule
 * without targets is invalid. Other rules just lose the schedule target.
 * The input is not modified.
 *
 * @returns The rewritten policy and whether anything was removed
 *
 * @category Deletion
 */
export function removeScheduleFromEscalationPolicy(
  policy: EscalationPolicy,
  scheduleId: string,
): { policy: EscalationPolicy; changed: boolean } {
  let changed = false;
  const rules: EscalationRule[] = [];

  for (const rule of policy.escalation_rules) {
    const targets = rule.targets.filter((target) => !targetsSchedule(target, scheduleId));
    if (targets.length === rule.targets.length) {
      rules.push(rule);
      continue;
    }
    changed = true;
    if (targets.length > 0) rules.push({ ...rule, targets });
  }

  return { policy: changed ? { ...policy, escalation_rules: rules } : policy, changed };
}

/**
 * Detaches a schedule from each of the given escalation policies.
 *
 * Policies that no longer exist are skipped; so is a policy that disappears
 * between the read and the write.
 *
 * @category Deletion
 */
export async function dissociateScheduleFromEscalationPolicies(
  gateway: ScheduleGateway,
  scheduleId: string,
  policyIds: readonly string[],
  options: DeleteScheduleOptions = {},
): Promise<void> {
  const logger = options.logger ?? silentLogger;
  const retryOptions = {
    timeoutMs: options.lookupTimeoutMs ?? RETRY_TIMEOUTS.lookup,
    intervalMs: options.retryIntervalMs,
    isRetryable: isTransientRemoteError,
    clock: options.clock,
  };

  for (const policyId of policyIds) {
    const action = `Dissociating schedule "${scheduleId}" from escalation policy`;
    try {
      const policy = await retry(() => gateway.getEscalationPolicy(policyId), retryOptions).catch(
        (error: unknown) => {
          if (isNotFoundError(error)) return undefined;
          throw error;
        },
      );
      if (!policy) {
        logger.debug("Escalation policy already gone", { scheduleId, policyId });
        continue;
      }

      const result = removeScheduleFromEscalationPolicy(policy, scheduleId);
      if (!result.changed) continue;

      logger.info("Removing schedule from escalation policy", { scheduleId, policyId });
      await retry(() => gateway.updateEscalationPolicy(policyId, result.policy), retryOptions).catch(
        (error: unknown) => {
          if (isNotFoundError(error)) return undefined;
          throw error;
        },
      );
    } catch (error) {
      throw new ScheduleOperationError(action, policyId, error);
    }
  }
}

// Any failure other than a 400 may be transient. Of the 400s, only the
// escalation policy conflict is worth another attempt, after compensation.
const isRetryableDeleteError = (error: unknown): boolean => {
  if (error instanceof CompensationError) return true;
  const remote = rootRemoteError(error);
  if (remote?.status !== 400) return true;
  return isScheduleInUseByEscalationPoliciesConflict(remote);
};

/**
 * Deletes a schedule once nothing depends on it.
 *
 * 1. Looks up the escalation policies and open incidents that depend on the schedule.
 * 2. Refuses with {@link BlockedByOpenIncidentsError} while incidents are open;
 *    nothing is deleted.
 * 3. Deletes, retrying until the deadline. When the service answers that
 *    escalation policies still use the schedule, the schedule is removed from
 *    those policies before the next attempt.
 *
 * @throws BlockedByOpenIncidentsError when open incidents exist
 * @throws ScheduleOperationError wrapping the last failure otherwise
 *
 * @category Deletion
 */
export async function deleteSchedule(
  gateway: ScheduleGateway,
  scheduleId: string,
  options: DeleteScheduleOptions = {},
): Promise<void> {
  const logger = options.logger ?? silentLogger;

  logger.info("Starting deletion of schedule", { scheduleId });
  const dependencies = await scanDependencies(gateway, scheduleId, {
    logger,
    clock: options.clock,
    retryIntervalMs: options.retryIntervalMs,
    timeoutMs: options.lookupTimeoutMs,
  });

  if (dependencies.openIncidentUrls.length > 0) {
    throw new BlockedByOpenIncidentsError(scheduleId, dependencies.openIncidentUrls);
  }

  logger.info("Deleting schedule", { scheduleId });
  try {
    await retry(
      async () => {
        try {
          await gateway.deleteSchedule(scheduleId);
        } catch (error) {
          if (!isScheduleInUseByEscalationPoliciesConflict(error)) throw error;

          logger.info("Dissociating escalation policies that use the schedule", {
            scheduleId,
            policyIds: dependencies.escalationPolicyIds,
          });
          try {
            await dissociateScheduleFromEscalationPolicies(
              gateway,
              scheduleId,
              dependencies.escalationPolicyIds,
              options,
            );
          } catch (compensationError) {
            throw new CompensationError(error, compensationError);
          }
          throw error;
        }
      },
      {
        timeoutMs: options.timeoutMs ?? RETRY_TIMEOUTS.write,
        intervalMs: options.retryIntervalMs,
        isRetryable: isRetryableDeleteError,
        clock: options.clock,
        onRetry: (error, attempt) =>
          logger.debug("Retrying schedule deletion", {
            scheduleId,
            attempt,
            error: describeError(error),
          }),
      },
    );
  } catch (error) {
    throw new ScheduleOperationError("Deleting schedule", scheduleId, error);
  }
}
