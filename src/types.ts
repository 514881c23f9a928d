/**
 * Declared configuration and materialized state of a schedule.
 *
 * @packageDocumentation
 */

import type { z } from "zod";
import type {
  DailyRestrictionConfigSchema,
  LayerConfigSchema,
  RestrictionConfigSchema,
  ScheduleConfigSchema,
  WeeklyRestrictionConfigSchema,
} from "./schedule.schemas.js";
import type { RestrictionType } from "./client.types.js";

// ============================================================================
// Declared configuration
// ============================================================================

/**
 * A declared schedule, after defaults have been applied.
 *
 * - `time_zone` (required): IANA zone name, e.g. `"Europe/Berlin"`
 * - `overflow` (optional): write-only; lets the last shift of a layer run past its end
 * - `description`: defaults to `"Managed by Terraform"`
 * - `layer` (required): at least one layer
 * - `teams`: team IDs
 *
 * @example
 * ```typescript
 * const config: ScheduleConfigInput = {
 *   name: "Primary",
 *   time_zone: "America/New_York",
 *   layer: [
 *     {
 *       name: "Weekdays",
 *       start: "2026-01-05T09:00:00-05:00",
 *       rotation_virtual_start: "2026-01-05T09:00:00-05:00",
 *       rotation_turn_length_seconds: 604800,
 *       users: ["PUSER01", "PUSER02"],
 *       restriction: [
 *         { type: "daily_restriction", start_time_of_day: "09:00:00", duration_seconds: 28800 },
 *       ],
 *     },
 *   ],
 * };
 * ```
 */
export type ScheduleConfig = z.output<typeof ScheduleConfigSchema>;

/** What users write, before defaults. */
export type ScheduleConfigInput = z.input<typeof ScheduleConfigSchema>;

export type LayerConfig = z.output<typeof LayerConfigSchema>;

export type LayerConfigInput = z.input<typeof LayerConfigSchema>;

export type DailyRestrictionConfig = z.output<typeof DailyRestrictionConfigSchema>;

export type WeeklyRestrictionConfig = z.output<typeof WeeklyRestrictionConfigSchema>;

/** Tagged on `type`. */
export type RestrictionConfig = z.output<typeof RestrictionConfigSchema>;

// ============================================================================
// Layer shape shared by configuration and state
// ============================================================================

/**
 * The fields needed to write a layer. Satisfied by both {@link LayerConfig}
 * and {@link LayerState}, so prior state can be fed back into an update.
 */
export interface LayerFields {
  id: string;
  name: string;
  start: string;
  end?: string;
  rotation_virtual_start: string;
  rotation_turn_length_seconds: number;
  users: readonly string[];
  restriction: readonly RestrictionFields[];
}

export interface RestrictionFields {
  type: RestrictionType;
  start_time_of_day: string;
  start_day_of_week?: number;
  duration_seconds: number;
}

// ============================================================================
// Materialized state
// ============================================================================

/**
 * A restriction as read back. `start_day_of_week` is absent, not zero, when
 * it does not apply.
 */
export type RestrictionState = RestrictionFields;

/**
 * An active layer as read back from the service.
 */
export interface LayerState extends LayerFields {
  /** `""` when the layer does not end. */
  end: string;
  users: string[];
  restriction: RestrictionState[];
  /** Computed by the service, two decimals. */
  rendered_coverage_percentage: string;
}

export interface FinalScheduleState {
  name: string;
  rendered_coverage_percentage: string;
}

/**
 * A schedule as known after a read.
 *
 * Layers that have already ended are not part of the state. The rest are
 * listed in declared order, oldest layer first.
 */
export interface ScheduleState {
  id: string;
  name: string;
  time_zone: string;
  description: string;
  layer: LayerState[];
  teams: string[];
  /** Zero or one entry. */
  final_schedule: FinalScheduleState[];
}
