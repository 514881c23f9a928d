import { beforeEach, describe, expect, it } from "vitest";
import type { ScheduleDocument } from "../src/client.types.js";
import { findEscalationPolicies, findOpenIncidents, scanDependencies } from "../src/dependencies.js";
import { RemoteApiError, ScheduleOperationError } from "../src/errors.js";
import { InMemoryScheduleGateway } from "../src/testing/index.js";

const doc = (teams: string[]): ScheduleDocument => ({
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

const incidentUrl = (id: string) => `https://example.pagerduty.test/incidents/${id}`;

describe("dependency scanning", () => {
  let gateway: InMemoryScheduleGateway;

  beforeEach(() => {
    gateway = new InMemoryScheduleGateway({ now: () => new Date("2026-03-01T12:00:00Z") });
  });

  it("finds escalation policies that target the schedule", async () => {
    const { id } = await gateway.createSchedule(doc([]));
    gateway.addEscalationPolicy({
      id: "PEP1",
      escalation_rules: [{ escalation_delay_in_minutes: 30, targets: [{ id, type: "schedule_reference" }] }],
    });
    gateway.addEscalationPolicy({
      id: "PEP2",
      escalation_rules: [{ escalation_delay_in_minutes: 30, targets: [{ id: "PUSER01", type: "user_reference" }] }],
    });

    await expect(findEscalationPolicies(gateway, id, { clock: gateway.clock })).resolves.toEqual(["PEP1"]);
  });

  it("lists open incidents of the schedule's teams", async () => {
    const { id } = await gateway.createSchedule(doc(["PTEAM1"]));
    gateway.addIncident({
      id: "PINC1",
      status: "triggered",
      html_url: incidentUrl("PINC1"),
      teams: [{ id: "PTEAM1", type: "team_reference" }],
    });
    gateway.addIncident({
      id: "PINC2",
      status: "acknowledged",
      html_url: incidentUrl("PINC2"),
      teams: [{ id: "PTEAM1", type: "team_reference" }],
    });
    gateway.addIncident({
      id: "PINC3",
      status: "resolved",
      html_url: incidentUrl("PINC3"),
      teams: [{ id: "PTEAM1", type: "team_reference" }],
    });
    gateway.addIncident({
      id: "PINC4",
      status: "triggered",
      html_url: incidentUrl("PINC4"),
      teams: [{ id: "PTEAM2", type: "team_reference" }],
    });

    await expect(findOpenIncidents(gateway, id, { clock: gateway.clock })).resolves.toEqual([
      incidentUrl("PINC1"),
      incidentUrl("PINC2"),
    ]);
    expect(gateway.callsTo("listOpenIncidents")[0]?.args).toEqual([
      { teamIds: ["PTEAM1"], statuses: ["triggered", "acknowledged"], dateRange: "all" },
    ]);
  });

  it("reports no incidents for a schedule without teams", async () => {
    const { id } = await gateway.createSchedule(doc([]));
    gateway.addIncident({
      id: "PINC1",
      status: "triggered",
      html_url: incidentUrl("PINC1"),
      teams: [{ id: "PTEAM1", type: "team_reference" }],
    });

    await expect(findOpenIncidents(gateway, id, { clock: gateway.clock })).resolves.toEqual([]);
    expect(gateway.callsTo("listOpenIncidents")).toHaveLength(0);
  });

  it("reads the schedule once for a full scan", async () => {
    const { id } = await gateway.createSchedule(doc(["PTEAM1"]));
    gateway.addEscalationPolicy({
      id: "PEP1",
      escalation_rules: [{ escalation_delay_in_minutes: 30, targets: [{ id, type: "schedule_reference" }] }],
    });

    await expect(scanDependencies(gateway, id, { clock: gateway.clock })).resolves.toEqual({
      escalationPolicyIds: ["PEP1"],
      openIncidentUrls: [],
    });
    expect(gateway.callsTo("getSchedule")).toHaveLength(1);
  });

  it("retries transient failures", async () => {
    const { id } = await gateway.createSchedule(doc([]));
    gateway.failNext("getSchedule", new RemoteApiError("unavailable", 503, undefined), 2);

    await expect(findEscalationPolicies(gateway, id, { clock: gateway.clock })).resolves.toEqual([]);
    expect(gateway.callsTo("getSchedule")).toHaveLength(3);
  });

  it("fails on other errors with context", async () => {
    const { id } = await gateway.createSchedule(doc([]));
    gateway.failNext("getSchedule", new RemoteApiError("forbidden", 403, undefined));

    const error = await findEscalationPolicies(gateway, id, { clock: gateway.clock }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(ScheduleOperationError);
    expect(error).toMatchObject({ message: `Reading schedule "${id}": forbidden` });
    expect(gateway.callsTo("getSchedule")).toHaveLength(1);
  });

  it("gives up on transient failures at the lookup deadline", async () => {
    const { id } = await gateway.createSchedule(doc([]));
    gateway.failNext("getSchedule", new RemoteApiError("unavailable", 503, undefined), 10);

    await expect(
      findEscalationPolicies(gateway, id, { clock: gateway.clock, timeoutMs: 4000 }),
    ).rejects.toThrow(`Reading schedule "${id}": unavailable`);
    expect(gateway.callsTo("getSchedule")).toHaveLength(3);
  });
});
