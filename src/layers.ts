import type {
  RemoteRestriction,
  RemoteScheduleLayer,
  ScheduleLayerDocument,
} from "./client.types.js";
import {
  currentTimestamp,
  hasEnded,
  normalizeTimestamp,
  renderRoundedPercentage,
  sameInstant,
  suppressLayerStartDiff,
} from "./datetime.utils.js";
import type { LayerFields, LayerState, RestrictionFields, RestrictionState } from "./types.js";

// ============================================================================
// Configuration -> service documents
// ============================================================================

export function expandRestriction(restriction: RestrictionFields): RemoteRestriction {
  const base = {
    type: restriction.type,
    start_time_of_day: restriction.start_time_of_day,
    duration_seconds: restriction.duration_seconds,
  };

  switch (restriction.type) {
    case "daily_restriction":
      return base;
    case "weekly_restriction":
      return restriction.start_day_of_week
        ? { ...base, start_day_of_week: restriction.start_day_of_week }
        : base;
    default: {
      const unknownType: never = restriction.type;
      throw new Error(`Unknown restriction type "${String(unknownType)}"`);
    }
  }
}

/**
 * Converts a layer to the document the service expects.
 *
 * `rotation_virtual_start` is sent in UTC: the service echoes back a
 * different wall-clock offset for the same instant otherwise. An empty `end`
 * becomes `null`, which is how the service is told the layer does not end.
 *
 * @throws InvalidTimestampError when `rotation_virtual_start` is not RFC 3339
 */
export function expandLayer(layer: LayerFields): ScheduleLayerDocument {
  return {
    ...(layer.id ? { id: layer.id } : {}),
    ...(layer.name ? { name: layer.name } : {}),
    start: layer.start,
    end: layer.end ? layer.end : null,
    rotation_virtual_start: normalizeTimestamp(layer.rotation_virtual_start),
    rotation_turn_length_seconds: layer.rotation_turn_length_seconds,
    users: layer.users.map((id) => ({ user: { id, type: "user_reference" as const } })),
    restrictions: layer.restriction.map(expandRestriction),
  };
}

export function expandLayers(layers: readonly LayerFields[]): ScheduleLayerDocument[] {
  return layers.map(expandLayer);
}

// ============================================================================
// Reconciliation
// ============================================================================

/**
 * Gives each declared layer without an ID the ID of the prior layer at the
 * same position.
 *
 * Declared configuration usually carries no layer IDs, so layers are matched
 * to what the service already has by index. IDs a declared layer names
 * explicitly are never handed out a second time.
 *
 * @param desired - Declared layers, in declared order
 * @param prior - Layers as last declared or read, in declared order
 *
 * @example
 * ```typescript
 * const layers = carryLayerIds(config.layer, state.layer);
 * // layers[0].id === state.layer[0].id when config.layer[0] had no id
 * ```
 */
export function carryLayerIds<T extends LayerFields>(
  desired: readonly T[],
  prior: readonly LayerFields[],
): T[] {
  const claimed = new Set(desired.map((layer) => layer.id).filter((id) => !!id));

  return desired.map((layer, index) => {
    if (layer.id) return layer;
    const id = prior[index]?.id;
    if (!id || claimed.has(id)) return layer;
    claimed.add(id);
    return { ...layer, id };
  });
}

/**
 * Computes the layer list for a full-document schedule update.
 *
 * The service never deletes a layer, and rejects a document that leaves out
 * one it still considers active. A layer that was declared before (`prior`)
 * but is gone from `desired` is therefore sent again with its `end` set to
 * `now`. Layers are matched by ID only; their content is irrelevant.
 *
 * @param desired - Layers as they should be, in declared order
 * @param prior - Layers as they were last declared or read
 * @param now - The instant removed layers end at
 * @returns `desired` unchanged, followed by the end-dated removed layers
 *
 * @example
 * ```typescript
 * const layers = reconcileLayers(
 *   expandLayers(config.layer),
 *   expandLayers(state.layer),
 *   new Date(),
 * );
 * ```
 */
export function reconcileLayers(
  desired: readonly ScheduleLayerDocument[],
  prior: readonly ScheduleLayerDocument[],
  now: Date = new Date(),
): ScheduleLayerDocument[] {
  const desiredIds = new Set(desired.map((layer) => layer.id).filter((id) => !!id));
  const end = currentTimestamp(now);

  // A prior layer without an ID was never accepted by the service.
  const removed = prior
    .filter((layer) => !!layer.id && !desiredIds.has(layer.id))
    .map((layer) => ({ ...layer, end }));

  return [...desired, ...removed];
}

// ============================================================================
// Service documents -> state
// ============================================================================

export function flattenRestriction(restriction: RemoteRestriction): RestrictionState {
  const state: RestrictionState = {
    duration_seconds: restriction.duration_seconds,
    start_time_of_day: restriction.start_time_of_day,
    type: restriction.type,
  };
  if (restriction.start_day_of_week && restriction.start_day_of_week > 0) {
    state.start_day_of_week = restriction.start_day_of_week;
  }
  return state;
}

export function flattenLayer(layer: RemoteScheduleLayer): LayerState {
  return {
    id: layer.id,
    name: layer.name,
    start: layer.start,
    end: layer.end ?? "",
    rotation_virtual_start: layer.rotation_virtual_start,
    rotation_turn_length_seconds: layer.rotation_turn_length_seconds,
    users: layer.users.map((wrapper) => wrapper.user.id),
    restriction: layer.restrictions.map(flattenRestriction),
    rendered_coverage_percentage: renderRoundedPercentage(layer.rendered_coverage_percentage ?? 0),
  };
}

/**
 * Turns the service's layer list into the layers that still apply.
 *
 * Layers whose end is at or before `now` are history and are dropped. The
 * service lists the most recently added layer first; the rest are reversed
 * into declared order, oldest layer first.
 *
 * @throws InvalidTimestampError when a layer's end is not RFC 3339
 */
export function materializeLayers(
  remote: readonly RemoteScheduleLayer[],
  now: Date = new Date(),
): LayerState[] {
  return remote
    .filter((layer) => !hasEnded(layer.end, now))
    .map(flattenLayer)
    .reverse();
}

// ============================================================================
// Planning
// ============================================================================

export type LayerField =
  | "name"
  | "start"
  | "end"
  | "rotation_virtual_start"
  | "rotation_turn_length_seconds"
  | "users"
  | "restriction";

/**
 * What an update would do to one layer.
 */
export type LayerChange =
  | { kind: "unchanged"; id: string }
  | { kind: "create"; name: string }
  | { kind: "update"; id: string; fields: LayerField[] }
  | { kind: "end"; id: string };

const sameList = <T>(a: readonly T[], b: readonly T[], eq: (x: T, y: T) => boolean): boolean =>
  a.length === b.length &&
  a.every((item, index) => {
    const other = b[index];
    return other !== undefined && eq(item, other);
  });

const sameRestriction = (a: RestrictionFields, b: RestrictionFields): boolean =>
  a.type === b.type &&
  a.start_time_of_day === b.start_time_of_day &&
  a.duration_seconds === b.duration_seconds &&
  (a.start_day_of_week ?? 0) === (b.start_day_of_week ?? 0);

/**
 * Lists the fields of `desired` that really differ from `current`.
 *
 * Timestamps are compared by instant, and a `start` the service moved
 * forward from the past is not a difference. An unset desired name accepts
 * whatever name the service chose.
 */
export function diffLayer(desired: LayerFields, current: LayerState, now: Date): LayerField[] {
  const fields: LayerField[] = [];

  if (desired.name && desired.name !== current.name) fields.push("name");
  if (!suppressLayerStartDiff(current.start, desired.start, now)) fields.push("start");
  if (!sameInstant(current.end, desired.end ?? "")) fields.push("end");
  if (!sameInstant(current.rotation_virtual_start, desired.rotation_virtual_start)) {
    fields.push("rotation_virtual_start");
  }
  if (current.rotation_turn_length_seconds !== desired.rotation_turn_length_seconds) {
    fields.push("rotation_turn_length_seconds");
  }
  if (!sameList(current.users, desired.users, (a, b) => a === b)) fields.push("users");
  if (!sameList(current.restriction, desired.restriction, sameRestriction)) {
    fields.push("restriction");
  }

  return fields;
}

/**
 * Classifies every layer an update would touch.
 *
 * @param desired - Declared layers
 * @param current - Layers from the last read
 */
export function planLayerChanges(
  desired: readonly LayerFields[],
  current: readonly LayerState[],
  now: Date = new Date(),
): LayerChange[] {
  const currentById = new Map(current.map((layer) => [layer.id, layer]));
  const desiredIds = new Set(desired.map((layer) => layer.id).filter((id) => !!id));
  const changes: LayerChange[] = [];

  for (const layer of desired) {
    const existing = layer.id ? currentById.get(layer.id) : undefined;
    if (!existing) {
      changes.push({ kind: "create", name: layer.name });
      continue;
    }
    const fields = diffLayer(layer, existing, now);
    changes.push(
      fields.length === 0
        ? { kind: "unchanged", id: existing.id }
        : { kind: "update", id: existing.id, fields },
    );
  }

  for (const layer of current) {
    if (!desiredIds.has(layer.id)) changes.push({ kind: "end", id: layer.id });
  }

  return changes;
}
