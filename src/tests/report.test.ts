import { describe, it, expect } from "vitest";
import { ExecutionLog } from "../engine/log";
import { buildScheduleReport, taskTransitions } from "../engine/report";
import { simulate } from "../engine/simulation";
import { isBusinessTime, stepStartDate } from "../engine/calendar";
import type { BusinessCalendar } from "../schemas/config.schema";
import { makeProject } from "./fixtures";

describe("ExecutionLog", () => {
  it("rejects entries that go back in time", () => {
    const log = new ExecutionLog();
    log.append({ time: 3, kind: "ready", taskId: "A", resourceId: null });
    expect(() => log.append({ time: 2, kind: "ready", taskId: "B", resourceId: null })).toThrow(
      "Log entry at time 2 appended after time 3"
    );
  });

  it("freezes appended entries", () => {
    const log = new ExecutionLog();
    const entry = log.append({ time: 1, kind: "work", taskId: "A", resourceId: "r1", amount: 1 });
    expect(Object.isFrozen(entry)).toBe(true);
  });

  it("queries by inclusive time range, task and resource", () => {
    const log = ExecutionLog.from([
      { time: 1, kind: "ready", taskId: "A", resourceId: null },
      { time: 1, kind: "started", taskId: "A", resourceId: "r1" },
      { time: 2, kind: "absent", taskId: null, resourceId: "r2" },
      { time: 4, kind: "finished", taskId: "A", resourceId: "r1" },
    ]);

    expect(log.size).toBe(4);
    expect(log.entriesBetween(2, 4).map((e) => e.kind)).toEqual(["absent", "finished"]);
    expect(log.entriesBetween(3, 3)).toEqual([]);
    expect(log.entriesBetween(4, 1)).toEqual([]);
    expect(log.entriesForTask("A")).toHaveLength(3);
    expect(log.entriesForResource("r2").map((e) => e.kind)).toEqual(["absent"]);
  });
});

describe("taskTransitions", () => {
  it("collapses per-resource duplicates of one transition", () => {
    expect(
      taskTransitions([
        { time: 1, kind: "ready", taskId: "A", resourceId: null },
        { time: 1, kind: "started", taskId: "A", resourceId: "r1" },
        { time: 1, kind: "started", taskId: "A", resourceId: "r2" },
        { time: 1, kind: "work", taskId: "A", resourceId: "r1", amount: 1 },
        { time: 2, kind: "finished", taskId: "A", resourceId: "r1" },
        { time: 2, kind: "finished", taskId: "A", resourceId: "r2" },
      ])
    ).toEqual(["not_ready", "ready", "working", "finished"]);
  });
});

describe("calendar", () => {
  const calendar: BusinessCalendar = {
    origin: "2024-01-01T00:00:00Z",
    unitMinutes: 60,
    weekendWorking: true,
    workStartHour: 9,
    workFinishHour: 17,
  };

  it("maps a step to the wall-clock time it starts at", () => {
    expect(stepStartDate(calendar, 10, 1).toISOString()).toBe("2024-01-01T09:00:00.000Z");
  });

  it("works only within the configured hours", () => {
    expect(isBusinessTime(calendar, 9, 1)).toBe(false);
    expect(isBusinessTime(calendar, 10, 1)).toBe(true);
    expect(isBusinessTime(calendar, 18, 1)).toBe(true);
    expect(isBusinessTime(calendar, 19, 1)).toBe(false);
    expect(isBusinessTime(undefined, 19, 1)).toBe(true);
  });
});

describe("buildScheduleReport", () => {
  it("reports lateness against due dates", () => {
    const project = makeProject(
      [
        { id: "A", duration: 3, dueDate: 5, requirements: ["build"] },
        { id: "B", duration: 2, dueDate: 4, predecessors: ["A"], requirements: ["build"] },
        { id: "C", duration: 1 },
      ],
      [{ id: "r1", name: "Rig", capabilities: ["build"], costPerTime: 2 }],
      {},
      { teams: [{ id: "day", members: ["r1"] }] }
    );
    const result = simulate(project);
    const report = buildScheduleReport(project, result);

    expect(report.duration).toBe(5);
    expect(report.totalCost).toBe(10);
    expect(report.criticalPath).toEqual(["A", "B"]);

    const rows = new Map(report.tasks.map((row) => [row.taskId, row]));
    expect(rows.get("A")).toMatchObject({ finishedAt: 3, lateness: 0, critical: true, workflowId: "w1" });
    expect(rows.get("B")).toMatchObject({ finishedAt: 5, lateness: 1, float: 0 });
    expect(rows.get("C")).toMatchObject({ finishedAt: 1, dueDate: null, lateness: null, float: 4 });

    expect(report.resources).toEqual([
      {
        resourceId: "r1",
        name: "Rig",
        teams: ["day"],
        capacity: 1,
        utilization: 1,
        series: [1, 1, 1, 1, 1],
      },
    ]);
  });
});
