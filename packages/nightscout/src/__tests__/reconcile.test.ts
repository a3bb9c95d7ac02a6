import { describe, it, expect } from "vitest";
import { describeAgeDecision, needsUpload, reconcileAge } from "../reconcile.js";

const HOUR = 60 * 60 * 1000;
const LOCAL = Date.UTC(2026, 9, 16, 9, 30);

describe("reconcileAge", () => {
  it("uploads when the remote has no record", () => {
    const decision = reconcileAge(LOCAL, null);
    expect(decision).toEqual({ action: "uploaded-no-previous" });
    expect(describeAgeDecision(decision, "SAGE")).toBe("uploaded (no previous SAGE)");
    expect(needsUpload(decision)).toBe(true);
  });

  it("stays in sync within the tolerance", () => {
    const decision = reconcileAge(LOCAL, LOCAL - 0.5 * HOUR);
    expect(decision).toEqual({ action: "in-sync", diffHours: 0.5 });
    expect(describeAgeDecision(decision, "SAGE")).toBe("in_sync");
    expect(needsUpload(decision)).toBe(false);
  });

  it("treats a difference equal to the tolerance as in sync", () => {
    expect(reconcileAge(LOCAL, LOCAL + 1.5 * HOUR).action).toBe("in-sync");
  });

  it("updates beyond the tolerance in either direction", () => {
    const decision = reconcileAge(LOCAL, LOCAL - 3 * HOUR);
    expect(decision).toEqual({ action: "updated", diffHours: 3 });
    expect(describeAgeDecision(decision, "SAGE")).toBe("updated (diff was 3.0h)");
    expect(reconcileAge(LOCAL, LOCAL + 2 * HOUR).action).toBe("updated");
  });

  it("honors a custom tolerance", () => {
    expect(reconcileAge(LOCAL, LOCAL - 3 * HOUR, 4).action).toBe("in-sync");
    expect(reconcileAge(LOCAL, LOCAL - 0.5 * HOUR, 0.25).action).toBe("updated");
  });

  it("names the age in the no-previous outcome", () => {
    expect(describeAgeDecision({ action: "uploaded-no-previous" }, "IAGE")).toBe(
      "uploaded (no previous IAGE)"
    );
  });
});
