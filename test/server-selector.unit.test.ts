import { describe, it, expect } from "vitest";
import { NoServerAvailableError } from "@core/errors/app-errors";
import { ScoringServerSelector } from "@features/email/smtp/server-selector";
import { smtpServer } from "./support/fakes";

describe("ScoringServerSelector", () => {
  it("scores a fresh server from priority and the initial averages", () => {
    const selector = new ScoringServerSelector();
    // 100 + 1 * 10 + 0.95 * 50 - 2.5
    expect(selector.score(smtpServer({ priority: 1 }))).toBe(155);
  });

  it("prefers the higher priority server", () => {
    const selector = new ScoringServerSelector();
    const pool = [smtpServer({ name: "a", priority: 1 }), smtpServer({ name: "b", priority: 2 })];

    expect(selector.next(pool).name).toBe("b");
  });

  it("breaks score ties by load, then pool order", () => {
    const selector = new ScoringServerSelector();
    const pool = [smtpServer({ name: "a" }), smtpServer({ name: "b" })];

    expect([selector.next(pool), selector.next(pool), selector.next(pool)].map((s) => s.name)).toEqual([
      "a",
      "b",
      "a",
    ]);
  });

  it("moves traffic away from a failing server", () => {
    const selector = new ScoringServerSelector();
    const a = smtpServer({ name: "a" });
    const b = smtpServer({ name: "b" });

    selector.recordOutcome(a, false, 2500);

    expect(selector.score(a)).toBeCloseTo(140.75, 6);
    expect(selector.next([a, b]).name).toBe("b");
  });

  it("never raises a server's score on failure", () => {
    const selector = new ScoringServerSelector();
    const a = smtpServer({ name: "a" });

    for (let i = 0; i < 5; i++) {
      selector.recordOutcome(a, false, 30000);
    }
    const before = selector.score(a);
    selector.recordOutcome(a, false, 10);

    expect(selector.score(a)).toBeLessThan(before);
    expect(selector.performance([a])[0].averageResponseTimeSeconds).toBe(2.5);
  });

  it("updates the moving averages on success", () => {
    const selector = new ScoringServerSelector();
    const a = smtpServer({ name: "a" });

    selector.recordOutcome(a, true, 500);

    const [performance] = selector.performance([a]);
    expect(performance).toEqual({
      name: "a",
      priority: 1,
      enabled: true,
      score: 156.35,
      successRate: 0.965,
      averageResponseTimeSeconds: 1.9,
      load: 0,
      successes: 1,
      failures: 0,
    });
  });

  it("never scores below zero", () => {
    const selector = new ScoringServerSelector();
    expect(selector.score(smtpServer({ priority: -20 }))).toBe(0);
  });

  it("skips disabled servers and fails when none remain", () => {
    const selector = new ScoringServerSelector();
    const disabled = smtpServer({ name: "off", priority: 9, enabled: false });

    expect(selector.next([disabled, smtpServer({ name: "on" })]).name).toBe("on");
    expect(() => selector.next([disabled])).toThrow(NoServerAvailableError);
    expect(() => selector.next([])).toThrow("No enabled SMTP server in the pool");
  });

  it("accepts custom smoothing", () => {
    const selector = new ScoringServerSelector({ smoothing: 1, initialSuccessRate: 1 });
    const a = smtpServer({ name: "a" });

    selector.recordOutcome(a, false);

    expect(selector.performance([a])[0].successRate).toBe(0);
  });
});
