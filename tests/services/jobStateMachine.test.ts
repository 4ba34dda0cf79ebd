import { describe, expect, it } from "vitest";
import {
  JOB_STATUSES,
  canRetry,
  canTransition,
  isTerminal,
  statusFields,
} from "../../src/services/business/jobStateMachine.js";

describe("jobStateMachine", () => {
  it("follows the success path one stage at a time", () => {
    expect(canTransition("queued", "downloading")).toBe(true);
    expect(canTransition("downloading", "transcoding")).toBe(true);
    expect(canTransition("transcoding", "ready")).toBe(true);
    expect(canTransition("queued", "ready")).toBe(false);
    expect(canTransition("downloading", "ready")).toBe(false);
  });

  it("lets any active status fail", () => {
    for (const status of ["queued", "downloading", "transcoding"] as const) {
      expect(canTransition(status, "failed")).toBe(true);
    }
  });

  it("only leaves terminal statuses through retry or expiry", () => {
    expect(canTransition("ready", "expired")).toBe(true);
    expect(canTransition("ready", "queued")).toBe(false);
    expect(canTransition("failed", "downloading")).toBe(false);
    expect(canTransition("expired", "ready")).toBe(false);
  });

  it("accepts retry only from failed and expired", () => {
    const retryable = JOB_STATUSES.filter(canRetry);
    expect(retryable).toEqual(["failed", "expired"]);
  });

  it("treats ready, failed and expired as terminal", () => {
    expect(JOB_STATUSES.filter(isTerminal)).toEqual(["ready", "failed", "expired"]);
  });

  describe("statusFields", () => {
    it("keeps the result reference only for ready", () => {
      expect(statusFields("ready", "ignored", "jobs/a.mp3")).toEqual({ error: null, resultRef: "jobs/a.mp3" });
      expect(statusFields("transcoding", null, "jobs/a.mp3")).toEqual({ error: null, resultRef: null });
    });

    it("rejects ready without a result reference", () => {
      expect(() => statusFields("ready")).toThrow("A ready job requires a result reference");
      expect(() => statusFields("ready", null, "  ")).toThrow();
    });

    it("never stores an empty failure message", () => {
      expect(statusFields("failed")).toEqual({ error: "unknown error", resultRef: null });
      expect(statusFields("failed", "download failed: boom", "jobs/a.mp3")).toEqual({
        error: "download failed: boom",
        resultRef: null,
      });
    });

    it("clears both fields for queued and expired", () => {
      expect(statusFields("queued", "old error", "jobs/a.mp3")).toEqual({ error: null, resultRef: null });
      expect(statusFields("expired", null, "jobs/a.mp3")).toEqual({ error: null, resultRef: null });
    });
  });
});
