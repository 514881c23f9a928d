/**
 * Keeps declared on-call schedules in sync with the PagerDuty API.
 *
 * The service lets schedule layers be added but never deleted: a layer can
 * only be ended. This library reconciles a declared schedule against that
 * append-only model, and deletes schedules safely when escalation policies or
 * open incidents still depend on them.
 *
 * @remarks
 * ## Core Concepts
 *
 * **Declared configuration**: A {@link ScheduleConfig} lists the layers a
 * schedule should have. It is validated up front by
 * {@link parseScheduleConfig}, before any remote call.
 *
 * **Reconciliation**: Updates replace the whole schedule document.
 * {@link reconcileLayers} appends every previously known layer that is no
 * longer declared, end-dated to now, so the service ends it instead of
 * rejecting the document. Reads drop ended layers
 * ({@link materializeLayers}).
 *
 * **Deletion**: {@link deleteSchedule} refuses while open incidents exist on
 * the schedule's teams, and detaches the schedule from escalation policies
 * when the service reports it is still in use.
 *
 * **Transport**: Everything goes through the {@link ScheduleGateway}
 * interface. {@link HttpScheduleGateway} implements it over HTTP;
 * `oncall-schedule-sync/testing` provides an in-memory stand-in.
 *
 * @example Create, then update a schedule
 * ```typescript
 * import { HttpScheduleGateway, ScheduleResource } from "oncall-schedule-sync";
 *
 * const resource = new ScheduleResource(new HttpScheduleGateway(fetch, { token: "test-token" }));
 * const state = await resource.create(config);
 *
 * // Later: layers missing from nextConfig are ended, not deleted
 * const next = await resource.update(state.id, nextConfig, state);
 * ```
 *
 * @example Delete a schedule
 * ```typescript
 * await resource.delete(state.id);
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Declared configuration
// ============================================================================

export type {
  ScheduleConfig,
  ScheduleConfigInput,
  LayerConfig,
  LayerConfigInput,
  RestrictionConfig,
  DailyRestrictionConfig,
  WeeklyRestrictionConfig,
  LayerFields,
  RestrictionFields,
  ScheduleState,
  LayerState,
  RestrictionState,
  FinalScheduleState,
} from "./types.js";

export {
  ScheduleConfigSchema,
  LayerConfigSchema,
  RestrictionConfigSchema,
  DEFAULT_DESCRIPTION,
} from "./schedule.schemas.js";

// ============================================================================
// Errors
// ============================================================================

export {
  RemoteApiError,
  NetworkError,
  ScheduleValidationError,
  InvalidTimestampError,
  BlockedByOpenIncidentsError,
  ScheduleOperationError,
  CompensationError,
  isNotFoundError,
  isTransientRemoteError,
} from "./errors.js";

// ============================================================================
// Gateway
// ============================================================================

export { HttpScheduleGateway, DEFAULT_API_URL } from "./client.js";

export type { HttpScheduleGatewayOptions } from "./client.js";

export type {
  ScheduleGateway,
  ScheduleDocument,
  ScheduleLayerDocument,
  RemoteSchedule,
  RemoteScheduleLayer,
  RemoteRestriction,
  RestrictionType,
  EscalationPolicy,
  EscalationRule,
  EscalationTarget,
  Incident,
  IncidentStatus,
  ListIncidentsQuery,
  WriteScheduleOptions,
  FetcherLike,
} from "./client.types.js";

export { OPEN_INCIDENT_STATUSES } from "./client.types.js";

export {
  RemoteScheduleSchema,
  ScheduleDocumentSchema,
  EscalationPolicySchema,
  IncidentSchema,
} from "./client.schemas.js";

// ============================================================================
// Time
// ============================================================================

export {
  normalizeTimestamp,
  parseTimestamp,
  isRfc3339,
  sameInstant,
  suppressLayerStartDiff,
  isValidTimeZone,
} from "./datetime.utils.js";

// ============================================================================
// Layers
// ============================================================================

export {
  carryLayerIds,
  reconcileLayers,
  materializeLayers,
  expandLayer,
  expandLayers,
  planLayerChanges,
  diffLayer,
} from "./layers.js";

export type { LayerChange, LayerField } from "./layers.js";

// ============================================================================
// Dependencies and deletion
// ============================================================================

export { findEscalationPolicies, findOpenIncidents, scanDependencies } from "./dependencies.js";

export type { DependencyScanOptions, ScheduleDependencies } from "./dependencies.js";

export {
  deleteSchedule,
  dissociateScheduleFromEscalationPolicies,
  removeScheduleFromEscalationPolicy,
  isScheduleInUseByEscalationPoliciesConflict,
  SCHEDULE_IN_USE_MESSAGE,
} from "./deletion.js";

export type { DeleteScheduleOptions } from "./deletion.js";

// ============================================================================
// Lifecycle
// ============================================================================

export {
  ScheduleResource,
  createScheduleResource,
  parseScheduleConfig,
  buildScheduleDocument,
  toScheduleState,
} from "./schedule.js";

export type {
  ScheduleResourceOptions,
  PriorSchedule,
  SchedulePlan,
  ScheduleAttribute,
} from "./schedule.js";

// ============================================================================
// Retry, logging, configuration
// ============================================================================

export { retry, systemClock, RETRY_TIMEOUTS, DEFAULT_RETRY_INTERVAL_MS } from "./retry.js";

export type { RetryOptions, Clock } from "./retry.js";

export { createConsoleLogger, silentLogger } from "./logger.js";

export type { Logger, LogLevel, LogFields, ConsoleLoggerOptions } from "./logger.js";

export { loadClientConfig, ClientConfigSchema, DEFAULT_CONFIG_PATH } from "./config.js";

export type { ClientConfig } from "./config.js";
