/**
 * Zod schemas for the declared schedule configuration.
 *
 * Everything here is checked before the first remote call. Keys are
 * snake_case, as users write them in configuration files.
 *
 * @see types.ts for the derived TypeScript types
 */

import * as z from "zod";
import { isRfc3339, isValidTimeZone } from "./datetime.utils.js";

export const DEFAULT_DESCRIPTION = "Managed by Terraform";

export const SECONDS_PER_DAY = 24 * 3600;

export const MIN_ROTATION_TURN_LENGTH_SECONDS = 3600;
export const MAX_ROTATION_TURN_LENGTH_SECONDS = 365 * SECONDS_PER_DAY;
export const MAX_RESTRICTION_DURATION_SECONDS = 7 * SECONDS_PER_DAY - 1;

const TIME_OF_DAY_PATTERN = /^([0-1][0-9]|2[0-3]):[0-5][0-9]:[0-5][0-9]$/;

const TimestampSchema = z.string().refine(isRfc3339, "must be a valid RFC 3339 timestamp");

const TimeOfDaySchema = z.string().regex(TIME_OF_DAY_PATTERN, "must be of 00:00:00 format");

// --------------------------------------------------------------------------
// Restrictions
// --------------------------------------------------------------------------

export const DailyRestrictionConfigSchema = z.object({
  type: z.literal("daily_restriction"),
  start_time_of_day: TimeOfDaySchema,
  // 0 is how "unset" round-trips through configuration files
  start_day_of_week: z
    .literal(0, "start_day_of_week must only be set for a weekly_restriction schedule restriction type")
    .optional(),
  duration_seconds: z
    .number()
    .int()
    .min(1)
    .max(
      SECONDS_PER_DAY - 1,
      "duration_seconds for a daily_restriction schedule restriction type must be shorter than a day",
    ),
});

export const WeeklyRestrictionConfigSchema = z.object({
  type: z.literal("weekly_restriction"),
  start_time_of_day: TimeOfDaySchema,
  start_day_of_week: z.number().int().min(0).max(7).optional(),
  duration_seconds: z.number().int().min(1).max(MAX_RESTRICTION_DURATION_SECONDS),
});

export const RestrictionConfigSchema = z.discriminatedUnion("type", [
  DailyRestrictionConfigSchema,
  WeeklyRestrictionConfigSchema,
]);

// --------------------------------------------------------------------------
// Layers and schedule
// --------------------------------------------------------------------------

export const LayerConfigSchema = z.object({
  /** Assigned by the service; empty until the layer has been created. */
  id: z.string().default(""),
  name: z.string().default(""),
  start: TimestampSchema,
  end: z.union([z.literal(""), TimestampSchema]).optional(),
  rotation_virtual_start: TimestampSchema,
  rotation_turn_length_seconds: z
    .number()
    .int()
    .min(MIN_ROTATION_TURN_LENGTH_SECONDS)
    .max(MAX_ROTATION_TURN_LENGTH_SECONDS),
  users: z.array(z.string().min(1)).min(1),
  restriction: z.array(RestrictionConfigSchema).default([]),
});

export const ScheduleConfigSchema = z.object({
  name: z.string().default(""),
  time_zone: z.string().refine(isValidTimeZone, "must be a valid IANA time zone name"),
  overflow: z.boolean().optional(),
  description: z.string().default(DEFAULT_DESCRIPTION),
  layer: z.array(LayerConfigSchema).min(1),
  teams: z.array(z.string()).default([]),
});
