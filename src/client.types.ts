/**
 * Scheduling API document types and the gateway contract.
 *
 * Types are derived from Zod schemas to ensure validation and types stay in sync.
 *
 * @see client.schemas.ts for the source Zod schemas
 */

import type { z } from "zod";
import type {
  EscalationPolicySchema,
  EscalationRuleSchema,
  EscalationTargetSchema,
  FinalScheduleSchema,
  IncidentSchema,
  IncidentStatusSchema,
  RemoteRestrictionSchema,
  RemoteScheduleLayerSchema,
  RemoteScheduleSchema,
  RestrictionTypeSchema,
  ScheduleDocumentSchema,
  ScheduleLayerDocumentSchema,
  TeamReferenceSchema,
} from "./client.schemas.js";

// --------------------------------------------------------------------------
// Types derived from Zod schemas
// --------------------------------------------------------------------------

/**
 * Kind of a layer restriction: `"daily_restriction"` or `"weekly_restriction"`.
 *
 * @category Gateway
 */
export type RestrictionType = z.infer<typeof RestrictionTypeSchema>;

/**
 * A recurring window limiting when a layer's rotation is active.
 *
 * - `start_day_of_week`: 1 (Monday) to 7; only meaningful for weekly restrictions
 */
export type RemoteRestriction = z.infer<typeof RemoteRestrictionSchema>;

/**
 * A layer as sent to the service. `id` is absent for layers the service has
 * not seen yet; `end: null` means the layer does not end.
 */
export type ScheduleLayerDocument = z.infer<typeof ScheduleLayerDocumentSchema>;

/**
 * A layer as returned by the service, with its assigned ID and the computed
 * coverage percentage.
 */
export type RemoteScheduleLayer = z.infer<typeof RemoteScheduleLayerSchema>;

/**
 * Writable part of a schedule. Updates replace the whole document, so
 * `schedule_layers` must always list every layer the service knows about.
 *
 * @category Gateway
 */
export type ScheduleDocument = z.infer<typeof ScheduleDocumentSchema>;

/**
 * A schedule as returned by the service.
 *
 * @category Gateway
 */
export type RemoteSchedule = z.infer<typeof RemoteScheduleSchema>;

export type FinalSchedule = z.infer<typeof FinalScheduleSchema>;

export type TeamReference = z.infer<typeof TeamReferenceSchema>;

/** Who an escalation rule notifies: a schedule or a user. */
export type EscalationTarget = z.infer<typeof EscalationTargetSchema>;

export type EscalationRule = z.infer<typeof EscalationRuleSchema>;

/**
 * An escalation policy. Fields not modelled here are preserved as-is.
 *
 * @category Gateway
 */
export type EscalationPolicy = z.infer<typeof EscalationPolicySchema>;

export type IncidentStatus = z.infer<typeof IncidentStatusSchema>;

/**
 * @category Gateway
 */
export type Incident = z.infer<typeof IncidentSchema>;

// --------------------------------------------------------------------------
// Constants
// --------------------------------------------------------------------------

/** Incident statuses that still need attention. */
export const OPEN_INCIDENT_STATUSES = ["triggered", "acknowledged"] as const satisfies readonly IncidentStatus[];

// --------------------------------------------------------------------------
// Gateway interface
// --------------------------------------------------------------------------

/** A `fetch` function or an object with a `fetch` method. */
export type FetcherLike =
  | typeof fetch
  | {
      fetch: typeof fetch;
    };

export interface WriteScheduleOptions {
  /** Let a layer's last shift run past the requested range instead of clipping it. */
  overflow?: boolean;
}

export interface ListIncidentsQuery {
  teamIds: readonly string[];
  statuses: readonly IncidentStatus[];
  dateRange: "all";
}

/**
 * Operations this library needs from the scheduling service.
 *
 * Failures are reported by throwing: {@link RemoteApiError} for HTTP errors
 * (404 for missing resources), {@link NetworkError} when no response arrived.
 *
 * @category Gateway
 */
export interface ScheduleGateway {
  createSchedule(doc: ScheduleDocument, options?: WriteScheduleOptions): Promise<RemoteSchedule>;
  getSchedule(id: string): Promise<RemoteSchedule>;
  updateSchedule(
    id: string,
    doc: ScheduleDocument,
    options?: WriteScheduleOptions,
  ): Promise<RemoteSchedule>;
  deleteSchedule(id: string): Promise<void>;
  getEscalationPolicy(id: string): Promise<EscalationPolicy>;
  updateEscalationPolicy(id: string, policy: EscalationPolicy): Promise<EscalationPolicy>;
  listOpenIncidents(query: ListIncidentsQuery): Promise<Incident[]>;
}
