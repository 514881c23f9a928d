/**
 * Schedule lifecycle: create, read, update, delete and import.
 *
 * A {@link ScheduleResource} turns a declared schedule into calls against a
 * {@link ScheduleGateway} and reads the result back as a {@link ScheduleState}.
 *
 * @example
 * ```typescript
 * import { HttpScheduleGateway, ScheduleResource, createConsoleLogger } from "oncall-schedule-sync";
 *
 * const resource = new ScheduleResource(
 *   new HttpScheduleGateway(fetch, { token: "test-token" }),
 *   { logger: createConsoleLogger() },
 * );
 *
 * const created = await resource.create({
 *   name: "Primary",
 *   time_zone: "Europe/Berlin",
 *   layer: [
 *     {
 *       start: "2026-01-05T09:00:00+01:00",
 *       rotation_virtual_start: "2026-01-05T09:00:00+01:00",
 *       rotation_turn_length_seconds: 604800,
 *       users: ["PUSER01", "PUSER02"],
 *     },
 *   ],
 * });
 *
 * // Dropping the layer from the configuration ends it on the service.
 * await resource.update(created.id, nextConfig, created);
 * ```
 *
 * @module
 */

import { HttpScheduleGateway } from "./client.js";
import type {
  FetcherLike,
  RemoteSchedule,
  ScheduleDocument,
  ScheduleGateway,
} from "./client.types.js";
import type { ClientConfig } from "./config.js";
import { renderRoundedPercentage } from "./datetime.utils.js";
import { deleteSchedule } from "./deletion.js";
import {
  ScheduleOperationError,
  ScheduleValidationError,
  describeError,
  isTransientRemoteError,
} from "./errors.js";
import {
  carryLayerIds,
  expandLayers,
  materializeLayers,
  planLayerChanges,
  reconcileLayers,
  type LayerChange,
} from "./layers.js";
import { createConsoleLogger, silentLogger, type Logger } from "./logger.js";
import { retry, systemClock, RETRY_TIMEOUTS, type Clock } from "./retry.js";
import { ScheduleConfigSchema } from "./schedule.schemas.js";
import type {
  LayerFields,
  ScheduleConfig,
  ScheduleConfigInput,
  ScheduleState,
} from "./types.js";

// ============================================================================
// Configuration -> document
// ============================================================================

/**
 * Validates a declared schedule and applies defaults.
 *
 * @throws ScheduleValidationError listing every problem found
 *
 * @example
 * ```typescript
 * parseScheduleConfig({ time_zone: "Mars/Olympus", layer: [] });
 * // ScheduleValidationError: Invalid schedule:
 * // time_zone: must be a valid IANA time zone name
 * // layer: Too small: expected array to have >=1 items
 * ```
 */
export function parseScheduleConfig(input: unknown): ScheduleConfig {
  const result = ScheduleConfigSchema.safeParse(input);
  if (result.success) return result.data;

  throw new ScheduleValidationError(
    result.error.issues.map((issue) => {
      const path = issue.path.map(String).join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    }),
  );
}

/**
 * Builds the schedule document for a create. Updates pass the reconciled
 * layer list instead.
 */
export function buildScheduleDocument(
  config: ScheduleConfig,
  layers = expandLayers(config.layer),
): ScheduleDocument {
  return {
    name: config.name,
    time_zone: config.time_zone,
    schedule_layers: layers,
    ...(config.description ? { description: config.description } : {}),
    ...(config.teams.length > 0
      ? { teams: config.teams.map((id) => ({ id, type: "team_reference" as const })) }
      : {}),
  };
}

// ============================================================================
// Document -> state
// ============================================================================

/**
 * Materializes what the service returned. Ended layers are left out.
 */
export function toScheduleState(remote: RemoteSchedule, now: Date): ScheduleState {
  return {
    id: remote.id,
    name: remote.name ?? "",
    time_zone: remote.time_zone,
    description: remote.description ?? "",
    layer: materializeLayers(remote.schedule_layers, now),
    teams: remote.teams.map((team) => team.id),
    final_schedule: remote.final_schedule
      ? [
          {
            name: remote.final_schedule.name,
            rendered_coverage_percentage: renderRoundedPercentage(
              remote.final_schedule.rendered_coverage_percentage,
            ),
          },
        ]
      : [],
  };
}

// ============================================================================
// Planning
// ============================================================================

export type ScheduleAttribute = "name" | "time_zone" | "description" | "teams";

/**
 * Differences between a declared schedule and its last known state.
 */
export interface SchedulePlan {
  attributes: ScheduleAttribute[];
  layers: LayerChange[];
  /** False when an update would be a no-op. */
  hasChanges: boolean;
}

// ============================================================================
// Lifecycle
// ============================================================================

export interface ScheduleResourceOptions {
  logger?: Logger;
  clock?: Clock;
  /** Pause between attempts of a remote call. */
  retryIntervalMs?: number;
  /** Per-call deadlines; see {@link RETRY_TIMEOUTS}. */
  timeouts?: Partial<Record<keyof typeof RETRY_TIMEOUTS, number>>;
}

/**
 * Anything that lists the layers a schedule had before an update: the
 * previous {@link ScheduleState} or the previously applied configuration.
 */
export interface PriorSchedule {
  layer: readonly LayerFields[];
}

/**
 * Keeps one remote schedule in line with its declared configuration.
 *
 * @category Schedule
 */
export class ScheduleResource {
  readonly #gateway: ScheduleGateway;
  readonly #logger: Logger;
  readonly #clock: Clock;
  readonly #retryIntervalMs: number | undefined;
  readonly #timeouts: Record<keyof typeof RETRY_TIMEOUTS, number>;

  constructor(gateway: ScheduleGateway, options: ScheduleResourceOptions = {}) {
    this.#gateway = gateway;
    this.#logger = options.logger ?? silentLogger;
    this.#clock = options.clock ?? systemClock;
    this.#retryIntervalMs = options.retryIntervalMs;
    this.#timeouts = { ...RETRY_TIMEOUTS, ...options.timeouts };
  }

  /**
   * Creates the schedule with a single call, then reads it back.
   *
   * @throws ScheduleValidationError before any remote call
   */
  async create(input: ScheduleConfigInput): Promise<ScheduleState> {
    const config = parseScheduleConfig(input);
    const doc = buildScheduleDocument(config);

    this.#logger.info("Creating schedule", { name: config.name });
    let created: RemoteSchedule;
    try {
      created = await this.#gateway.createSchedule(doc, { overflow: config.overflow });
    } catch (error) {
      throw new ScheduleOperationError("Creating schedule", config.name, error);
    }

    return this.read(created.id);
  }

  /**
   * Reads the schedule, retrying transient failures.
   */
  async read(id: string): Promise<ScheduleState> {
    this.#logger.info("Reading schedule", { scheduleId: id });
    const remote = await this.#withRetry(
      () => this.#gateway.getSchedule(id),
      "Reading schedule",
      id,
      this.#timeouts.read,
    );
    return toScheduleState(remote, this.#now());
  }

  /**
   * Replaces the schedule with the declared configuration.
   *
   * Declared layers without an ID take the ID of the prior layer at the same
   * position. Layers listed in `prior` but no longer declared are ended now
   * rather than removed.
   *
   * @param prior - The state or configuration the schedule was last synced with
   * @throws ScheduleValidationError before any remote call
   */
  async update(id: string, input: ScheduleConfigInput, prior: PriorSchedule): Promise<ScheduleState> {
    const config = parseScheduleConfig(input);
    const layers = reconcileLayers(
      expandLayers(carryLayerIds(config.layer, prior.layer)),
      expandLayers(prior.layer),
      this.#now(),
    );
    const doc = buildScheduleDocument(config, layers);

    this.#logger.info("Updating schedule", { scheduleId: id });
    await this.#withRetry(
      () => this.#gateway.updateSchedule(id, doc, { overflow: config.overflow }),
      "Updating schedule",
      id,
      this.#timeouts.write,
    );

    return this.read(id);
  }

  /**
   * Deletes the schedule; see {@link deleteSchedule}.
   */
  async delete(id: string): Promise<void> {
    await deleteSchedule(this.#gateway, id, {
      logger: this.#logger,
      clock: this.#clock,
      retryIntervalMs: this.#retryIntervalMs,
      timeoutMs: this.#timeouts.write,
      lookupTimeoutMs: this.#timeouts.lookup,
    });
  }

  /**
   * Adopts an existing schedule by ID. Everything else comes from the read.
   */
  async import(id: string): Promise<ScheduleState> {
    return this.read(id);
  }

  /**
   * Compares a declared schedule with its last known state without calling
   * the service.
   *
   * @throws ScheduleValidationError when the configuration is invalid
   */
  plan(input: ScheduleConfigInput, state: ScheduleState): SchedulePlan {
    const config = parseScheduleConfig(input);
    const attributes: ScheduleAttribute[] = [];

    if (config.name !== state.name) attributes.push("name");
    if (config.time_zone !== state.time_zone) attributes.push("time_zone");
    if (config.description !== state.description) attributes.push("description");
    if (config.teams.join("\n") !== state.teams.join("\n")) attributes.push("teams");

    const layers = planLayerChanges(
      carryLayerIds(config.layer, state.layer),
      state.layer,
      this.#now(),
    );
    return {
      attributes,
      layers,
      hasChanges: attributes.length > 0 || layers.some((change) => change.kind !== "unchanged"),
    };
  }

  #now(): Date {
    return new Date(this.#clock.now());
  }

  #withRetry<T>(
    operation: () => Promise<T>,
    action: string,
    id: string,
    timeoutMs: number,
  ): Promise<T> {
    return retry(operation, {
      timeoutMs,
      intervalMs: this.#retryIntervalMs,
      isRetryable: isTransientRemoteError,
      clock: this.#clock,
      onRetry: (error, attempt) =>
        this.#logger.debug(`Retrying: ${action}`, {
          scheduleId: id,
          attempt,
          error: describeError(error),
        }),
    }).catch((error: unknown) => {
      throw new ScheduleOperationError(action, id, error);
    });
  }
}

/**
 * Wires a {@link ScheduleResource} to the HTTP gateway from loaded client
 * configuration.
 *
 * @category Schedule
 */
export function createScheduleResource(
  config: ClientConfig,
  fetcher: FetcherLike = fetch,
): ScheduleResource {
  return new ScheduleResource(
    new HttpScheduleGateway(fetcher, { token: config.api.token, baseUrl: config.api.base_url }),
    {
      logger: createConsoleLogger({ level: config.log.level, json: config.log.json }),
      retryIntervalMs: config.retry.interval_ms,
      timeouts: {
        lookup: config.retry.lookup_timeout_ms,
        read: config.retry.read_timeout_ms,
        write: config.retry.write_timeout_ms,
      },
    },
  );
}
