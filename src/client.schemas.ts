/**
 * Zod schemas for the scheduling API's documents.
 *
 * These schemas define the contract between this library and the remote
 * service. TypeScript types are derived from them with z.infer so validation
 * and types stay in sync.
 *
 * @see client.types.ts for the derived TypeScript types
 */

import * as z from "zod";

// --------------------------------------------------------------------------
// References
// --------------------------------------------------------------------------

export const UserReferenceSchema = z.object({
  id: z.string(),
  type: z.literal("user_reference"),
});

export const TeamReferenceSchema = z.object({
  id: z.string(),
  type: z.literal("team_reference"),
});

export const EscalationPolicyReferenceSchema = z.object({
  id: z.string(),
  type: z.literal("escalation_policy_reference"),
});

/** Who an escalation rule notifies. */
export const EscalationTargetSchema = z.discriminatedUnion("type", [
  z.looseObject({ id: z.string(), type: z.literal("schedule_reference") }),
  z.looseObject({ id: z.string(), type: z.literal("user_reference") }),
]);

// --------------------------------------------------------------------------
// Schedules
// --------------------------------------------------------------------------

export const RestrictionTypeSchema = z.enum(["daily_restriction", "weekly_restriction"]);

export const RemoteRestrictionSchema = z.object({
  type: RestrictionTypeSchema,
  start_time_of_day: z.string(),
  start_day_of_week: z.number().int().nullish(),
  duration_seconds: z.number().int(),
});

export const ScheduleLayerDocumentSchema = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
  start: z.string(),
  // null unsets the end of a layer
  end: z.string().nullable(),
  rotation_virtual_start: z.string(),
  rotation_turn_length_seconds: z.number().int(),
  users: z.array(z.object({ user: UserReferenceSchema })),
  restrictions: z.array(RemoteRestrictionSchema).default([]),
});

export const RemoteScheduleLayerSchema = ScheduleLayerDocumentSchema.extend({
  id: z.string(),
  name: z.string().default(""),
  end: z.string().nullish(),
  rendered_coverage_percentage: z.number().optional(),
});

export const ScheduleDocumentSchema = z.object({
  name: z.string(),
  time_zone: z.string(),
  description: z.string().optional(),
  schedule_layers: z.array(ScheduleLayerDocumentSchema),
  teams: z.array(TeamReferenceSchema).optional(),
});

export const FinalScheduleSchema = z.object({
  name: z.string(),
  rendered_coverage_percentage: z.number(),
});

export const RemoteScheduleSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  time_zone: z.string(),
  description: z.string().nullish(),
  html_url: z.string().optional(),
  schedule_layers: z.array(RemoteScheduleLayerSchema).default([]),
  teams: z.array(TeamReferenceSchema).default([]),
  escalation_policies: z.array(EscalationPolicyReferenceSchema).default([]),
  final_schedule: FinalScheduleSchema.nullish(),
});

export const ScheduleEnvelopeSchema = z.object({
  schedule: RemoteScheduleSchema,
});

// --------------------------------------------------------------------------
// Escalation policies
// --------------------------------------------------------------------------

// Loose objects: fields this library does not interpret must survive a
// read-modify-write of the policy.
export const EscalationRuleSchema = z.looseObject({
  id: z.string().optional(),
  escalation_delay_in_minutes: z.number().int(),
  targets: z.array(EscalationTargetSchema),
});

export const EscalationPolicySchema = z.looseObject({
  id: z.string(),
  name: z.string().optional(),
  escalation_rules: z.array(EscalationRuleSchema),
});

export const EscalationPolicyEnvelopeSchema = z.object({
  escalation_policy: EscalationPolicySchema,
});

// --------------------------------------------------------------------------
// Incidents
// --------------------------------------------------------------------------

export const IncidentStatusSchema = z.enum(["triggered", "acknowledged", "resolved"]);

export const IncidentSchema = z.object({
  id: z.string(),
  status: IncidentStatusSchema,
  html_url: z.string(),
  teams: z.array(TeamReferenceSchema).default([]),
});

export const IncidentPageSchema = z.object({
  incidents: z.array(IncidentSchema),
  more: z.boolean().default(false),
});

// --------------------------------------------------------------------------
// Errors
// --------------------------------------------------------------------------

export const ErrorEnvelopeSchema = z.object({
  error: z.object({
    message: z.string().optional(),
    code: z.number().optional(),
    errors: z.array(z.string()).default([]),
  }),
});
