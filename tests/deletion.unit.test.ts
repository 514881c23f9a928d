import { beforeEach, describe, expect, it } from "vitest";
import type { EscalationPolicy, ScheduleDocument } from "../src/client.types.js";
import {
  SCHEDULE_IN_USE_MESSAGE,
  deleteSchedule,
  dissociateScheduleFromEscalationPolicies,
  isScheduleInUseByEscalationPoliciesConflict,
  removeScheduleFromEscalationPolicy,
} from "../src/deletion.js";
import {
  BlockedByOpenIncidentsError,
  CompensationError,
  NetworkError,
  RemoteApiError,
  ScheduleOperationError,
} from "../src/errors.js";
import { InMemoryScheduleGateway } from "../src/testing/index.js";

const doc = (teams: string[] = []): ScheduleDocument => ({
  name: "Primary",
  time_zone: "UTC",
  schedule_layers: [
    {
      start: "2026-01-05T08:00:00Z",
      end: null,
      rotation_virtual_start: "2026-01-05T08:00:00Z",
      rotation_turn_length_seconds: 86400,
      users: [{ user: { id: "PUSER01", type: "user_reference" } }],
      restrictions: [],
    },
  ],
  teams: teams.map((id) => ({ id, type: "team_reference" as const })),
});

const soleTargetPolicy = (policyId: string, scheduleId: string): EscalationPolicy => ({
  id: policyId,
  name: "Ops",
  escalation_rules: [
    { id: "PRULE1", escalation_delay_in_minutes: 30, targets: [{ id: scheduleId, type: "schedule_reference" }] },
  ],
});

describe("isScheduleInUseByEscalationPoliciesConflict", () => {
  it("matches a 400 listing exactly the in-use error", () => {
    expect(
      isScheduleInUseByEscalationPoliciesConflict(
        new RemoteApiError("conflict", 400, undefined, [SCHEDULE_IN_USE_MESSAGE]),
      ),
    ).toBe(true);
  });

  it("matches through operation context", () => {
    const error = new ScheduleOperationError(
      "Deleting schedule",
      "PSCHED1",
      new RemoteApiError("conflict", 400, undefined, [SCHEDULE_IN_USE_MESSAGE]),
    );
    expect(isScheduleInUseByEscalationPoliciesConflict(error)).toBe(true);
  });

  it("does not match other failures", () => {
    expect(
      isScheduleInUseByEscalationPoliciesConflict(
        new RemoteApiError("conflict", 400, undefined, [SCHEDULE_IN_USE_MESSAGE, "Something else"]),
      ),
    ).toBe(false);
    expect(
      isScheduleInUseByEscalationPoliciesConflict(
        new RemoteApiError("conflict", 409, undefined, [SCHEDULE_IN_USE_MESSAGE]),
      ),
    ).toBe(false);
    expect(isScheduleInUseByEscalationPoliciesConflict(new RemoteApiError("bad", 400, undefined))).toBe(false);
    expect(isScheduleInUseByEscalationPoliciesConflict(new Error(SCHEDULE_IN_USE_MESSAGE))).toBe(false);
  });
});

describe("removeScheduleFromEscalationPolicy", () => {
  it("drops rules that only targeted the schedule and trims the others", () => {
    const policy: EscalationPolicy = {
      id: "PEP1",
      escalation_rules: [
        { id: "PRULE1", escalation_delay_in_minutes: 30, targets: [{ id: "PSCHED1", type: "schedule_reference" }] },
        {
          id: "PRULE2",
          escalation_delay_in_minutes: 15,
          targets: [
            { id: "PUSER01", type: "user_reference" },
            { id: "PSCHED1", type: "schedule_reference" },
          ],
        },
      ],
    };

    const result = removeScheduleFromEscalationPolicy(policy, "PSCHED1");

    expect(result.changed).toBe(true);
    expect(result.policy.escalation_rules).toEqual([
      { id: "PRULE2", escalation_delay_in_minutes: 15, targets: [{ id: "PUSER01", type: "user_reference" }] },
    ]);
    expect(policy.escalation_rules).toHaveLength(2);
  });

  it("leaves policies that do not target the schedule alone", () => {
    const policy = soleTargetPolicy("PEP1", "POTHER");

    const result = removeScheduleFromEscalationPolicy(policy, "PSCHED1");

    expect(result.changed).toBe(false);
    expect(result.policy).toBe(policy);
  });
});

describe("dissociateScheduleFromEscalationPolicies", () => {
  it("skips policies that no longer exist", async () => {
    const gateway = new InMemoryScheduleGateway();

    await expect(
      dissociateScheduleFromEscalationPolicies(gateway, "PSCHED1", ["PMISSING"], { clock: gateway.clock }),
    ).resolves.toBeUndefined();
    expect(gateway.callsTo("updateEscalationPolicy")).toHaveLength(0);
  });

  it("tolerates a policy deleted between the read and the write", async () => {
    const gateway = new InMemoryScheduleGateway();
    gateway.addEscalationPolicy(soleTargetPolicy("PEP1", "PSCHED1"));
    gateway.failNext("updateEscalationPolicy", new RemoteApiError("gone", 404, undefined));

    await expect(
      dissociateScheduleFromEscalationPolicies(gateway, "PSCHED1", ["PEP1"], { clock: gateway.clock }),
    ).resolves.toBeUndefined();
    expect(gateway.callsTo("updateEscalationPolicy")).toHaveLength(1);
  });

  it("does not rewrite policies that do not target the schedule", async () => {
    const gateway = new InMemoryScheduleGateway();
    gateway.addEscalationPolicy(soleTargetPolicy("PEP1", "POTHER"));

    await dissociateScheduleFromEscalationPolicies(gateway, "PSCHED1", ["PEP1"], { clock: gateway.clock });

    expect(gateway.callsTo("updateEscalationPolicy")).toHaveLength(0);
  });
});

describe("deleteSchedule", () => {
  let gateway: InMemoryScheduleGateway;

  beforeEach(() => {
    gateway = new InMemoryScheduleGateway({ now: () => new Date("2026-03-01T12:00:00Z") });
  });

  it("deletes a schedule nothing depends on", async () => {
    const { id } = await gateway.createSchedule(doc());

    await deleteSchedule(gateway, id, { clock: gateway.clock });

    expect(gateway.schedules.has(id)).toBe(false);
    expect(gateway.callsTo("deleteSchedule")).toHaveLength(1);
  });

  it("detaches escalation policies when the service reports the schedule in use", async () => {
    const { id } = await gateway.createSchedule(doc());
    gateway.addEscalationPolicy(soleTargetPolicy("PEP1", id));

    await deleteSchedule(gateway, id, { clock: gateway.clock });

    expect(gateway.schedules.has(id)).toBe(false);
    expect(gateway.escalationPolicies.get("PEP1")?.escalation_rules).toEqual([]);
    expect(gateway.callsTo("deleteSchedule")).toHaveLength(2);
    expect(gateway.callsTo("updateEscalationPolicy")).toHaveLength(1);
  });

  it("refuses while open incidents exist, without deleting anything", async () => {
    const { id } = await gateway.createSchedule(doc(["PTEAM1"]));
    gateway.addIncident({
      id: "PINC1",
      status: "triggered",
      html_url: "https://example.pagerduty.test/incidents/PINC1",
      teams: [{ id: "PTEAM1", type: "team_reference" }],
    });

    const error = await deleteSchedule(gateway, id, { clock: gateway.clock }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(BlockedByOpenIncidentsError);
    expect(error).toMatchObject({
      message:
        `Before removing schedule "${id}" you must first resolve the following incidents ` +
        "related to escalation policies using this schedule:\n" +
        "https://example.pagerduty.test/incidents/PINC1",
      incidentUrls: ["https://example.pagerduty.test/incidents/PINC1"],
    });
    expect(gateway.callsTo("deleteSchedule")).toHaveLength(0);
    expect(gateway.schedules.has(id)).toBe(true);
  });

  it("fails fast on other client errors", async () => {
    const { id } = await gateway.createSchedule(doc());
    gateway.failNext("deleteSchedule", new RemoteApiError("bad", 400, undefined, ["Something else"]));

    await expect(deleteSchedule(gateway, id, { clock: gateway.clock })).rejects.toThrow(
      `Deleting schedule "${id}": bad`,
    );
    expect(gateway.callsTo("deleteSchedule")).toHaveLength(1);
  });

  it("retries transient failures", async () => {
    const { id } = await gateway.createSchedule(doc());
    gateway.failNext("deleteSchedule", new RemoteApiError("unavailable", 503, undefined));

    await deleteSchedule(gateway, id, { clock: gateway.clock });

    expect(gateway.callsTo("deleteSchedule")).toHaveLength(2);
    expect(gateway.schedules.has(id)).toBe(false);
  });

  it("retries network failures", async () => {
    const { id } = await gateway.createSchedule(doc());
    gateway.failNext("deleteSchedule", new NetworkError("socket hang up"));

    await deleteSchedule(gateway, id, { clock: gateway.clock });

    expect(gateway.callsTo("deleteSchedule")).toHaveLength(2);
    expect(gateway.schedules.has(id)).toBe(false);
  });

  it("gives up with the last error once the deadline passes", async () => {
    const { id } = await gateway.createSchedule(doc());
    gateway.failNext("deleteSchedule", new RemoteApiError("unavailable", 503, undefined), 5);

    const error = await deleteSchedule(gateway, id, { clock: gateway.clock, timeoutMs: 4000 }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(ScheduleOperationError);
    expect(error).toMatchObject({ message: `Deleting schedule "${id}": unavailable` });
    expect(gateway.callsTo("deleteSchedule")).toHaveLength(3);
    expect(gateway.schedules.has(id)).toBe(true);
  });

  it("keeps deleting when a policy update during detachment finds the policy gone", async () => {
    const { id } = await gateway.createSchedule(doc());
    gateway.addEscalationPolicy(soleTargetPolicy("PEP1", id));
    gateway.failNext("updateEscalationPolicy", new RemoteApiError("gone", 404, undefined));

    await deleteSchedule(gateway, id, { clock: gateway.clock });

    expect(gateway.schedules.has(id)).toBe(false);
    expect(gateway.callsTo("deleteSchedule")).toHaveLength(3);
    expect(gateway.callsTo("updateEscalationPolicy")).toHaveLength(2);
  });

  it("chains the delete error and the workaround failure", async () => {
    const { id } = await gateway.createSchedule(doc());
    gateway.addEscalationPolicy(soleTargetPolicy("PEP1", id));
    gateway.failNext("getEscalationPolicy", new RemoteApiError("forbidden", 403, undefined), 3);

    const error = await deleteSchedule(gateway, id, { clock: gateway.clock, timeoutMs: 4000 }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(ScheduleOperationError);
    expect(error).toMatchObject({
      message:
        `Deleting schedule "${id}": 400: ${SCHEDULE_IN_USE_MESSAGE}; ` +
        `Dissociating schedule "${id}" from escalation policy "PEP1": forbidden`,
    });
    const cause = error instanceof Error ? error.cause : undefined;
    expect(cause).toBeInstanceOf(CompensationError);
    expect(gateway.callsTo("deleteSchedule")).toHaveLength(3);
    expect(gateway.schedules.has(id)).toBe(true);
  });
});
