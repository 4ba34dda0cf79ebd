import { beforeEach, describe, expect, it } from "vitest";
import request from "supertest";
import type { Express } from "express";
import { createApp, type AppConfig } from "../../src/app.js";
import { FakeDispatcher, FakeObjectStore, InMemoryJobRepository } from "../helpers/fakes.js";

const baseConfig: AppConfig = {
  nodeEnv: "test",
  resultUrlTtlSeconds: 900,
  corsAllowOrigins: [],
  rateLimitPerMin: 0,
  jobRetentionDays: 0,
  statusPollIntervalMs: 10,
  statusKeepaliveMs: 1_000,
};

describe("HTTP API", () => {
  let jobs: InMemoryJobRepository;
  let storage: FakeObjectStore;
  let dispatcher: FakeDispatcher;

  function buildApp(config: Partial<AppConfig> = {}, extra: { isReady?: () => boolean; now?: () => number } = {}): Express {
    return createApp({ jobs, storage, dispatcher, config: { ...baseConfig, ...config }, ...extra });
  }

  beforeEach(() => {
    jobs = new InMemoryJobRepository();
    storage = new FakeObjectStore();
    dispatcher = new FakeDispatcher();
  });

  describe("health", () => {
    it("reports liveness and readiness", async () => {
      let ready = false;
      const app = buildApp({}, { isReady: () => ready });

      await request(app).get("/health").expect(200, { ok: true });
      await request(app).get("/ready").expect(503, { ready: false });
      ready = true;
      await request(app).get("/ready").expect(200, { ready: true });
    });
  });

  describe("POST /jobs", () => {
    it("queues a job for a supported link in share text", async () => {
      const res = await request(buildApp())
        .post("/jobs")
        .send({ url: "看看这个 https://v.douyin.com/iAbCdEf/ 复制打开" })
        .expect(202);

      expect(res.body).toEqual({ jobId: expect.any(String), status: "queued" });
      expect(await jobs.get(res.body.jobId)).toMatchObject({
        source_url: "https://v.douyin.com/iAbCdEf/",
        platform: "douyin",
        status: "queued",
      });
      expect(dispatcher.enqueued).toEqual([{ jobId: res.body.jobId, sourceUrl: "https://v.douyin.com/iAbCdEf/" }]);
    });

    it.each([
      [{}, "url is required"],
      [{ url: "   " }, "url is required"],
      [{ url: "no link here" }, "no valid url found"],
      [{ url: "https://example.com/watch?v=1" }, "unsupported platform"],
    ])("rejects %j with %s", async (body, message) => {
      const res = await request(buildApp()).post("/jobs").send(body).expect(400);

      expect(res.body).toMatchObject({ error: message, kind: "validation" });
      expect(jobs.rows.size).toBe(0);
      expect(dispatcher.enqueued).toEqual([]);
    });

    it("rejects malformed JSON", async () => {
      const res = await request(buildApp())
        .post("/jobs")
        .set("Content-Type", "application/json")
        .send('{"url":')
        .expect(400);

      expect(res.body).toEqual({ error: "invalid json", kind: "validation" });
    });

    it("answers 503 when the task cannot be dispatched but keeps the queued row", async () => {
      dispatcher.fail = true;

      const res = await request(buildApp())
        .post("/jobs")
        .send({ url: "https://www.bilibili.com/video/BV1xx" })
        .expect(503);

      expect(res.body).toMatchObject({ kind: "dispatch_failed" });
      expect([...jobs.rows.values()].map((row) => row.status)).toEqual(["queued"]);
    });
  });

  describe("reading jobs", () => {
    it("returns a job view with a signed url once ready", async () => {
      jobs.seed({ id: "job-1", status: "ready", result_ref: "jobs/job-1.mp3" });

      const res = await request(buildApp()).get("/jobs/job-1").expect(200);

      expect(res.body).toEqual({
        jobId: "job-1",
        sourceUrl: "https://www.douyin.com/video/job-1",
        platform: "douyin",
        status: "ready",
        error: null,
        mp3Url: "https://storage.test/v2m/jobs/job-1.mp3?X-Amz-Expires=900",
        createdAt: "2024-01-01T00:00:00.000Z",
        updatedAt: "2024-01-01T00:00:00.000Z",
      });
    });

    it("answers 404 for unknown jobs", async () => {
      const res = await request(buildApp()).get("/jobs/missing").expect(404);

      expect(res.body).toEqual({ error: "Job with id 'missing' not found", kind: "not_found" });
    });

    it("lists newest first and honours the limit", async () => {
      jobs.seed({ id: "older" });
      jobs.seed({ id: "newer" });

      const res = await request(buildApp()).get("/jobs?limit=1").expect(200);

      expect(res.body.jobs.map((job: { jobId: string }) => job.jobId)).toEqual(["newer"]);
    });
  });

  describe("GET /jobs/:id/download", () => {
    it("redirects to a signed url with a filename hint", async () => {
      jobs.seed({ id: "job-1", status: "ready", result_ref: "jobs/job-1.mp3" });

      const res = await request(buildApp()).get("/jobs/job-1/download").expect(302);

      expect(res.headers.location).toBe(
        "https://storage.test/v2m/jobs/job-1.mp3?X-Amz-Expires=900&filename=audio-job-1.mp3"
      );
    });

    it("answers 409 until the job is ready", async () => {
      jobs.seed({ id: "job-1", status: "transcoding" });

      const res = await request(buildApp()).get("/jobs/job-1/download").expect(409);

      expect(res.body).toEqual({ error: "job not ready", kind: "conflict" });
    });
  });

  describe("POST /jobs/:id/retry", () => {
    it("requeues a failed job", async () => {
      jobs.seed({ id: "job-1", status: "failed", error: "download failed: download http status 403" });

      const res = await request(buildApp()).post("/jobs/job-1/retry").expect(202);

      expect(res.body).toEqual({ jobId: "job-1", status: "queued" });
      expect(await jobs.get("job-1")).toMatchObject({ status: "queued", error: null });
      expect(dispatcher.enqueued).toEqual([{ jobId: "job-1", sourceUrl: "https://www.douyin.com/video/job-1" }]);
    });

    it("refuses jobs that are still in flight", async () => {
      jobs.seed({ id: "job-1", status: "downloading" });

      const res = await request(buildApp()).post("/jobs/job-1/retry").expect(409);

      expect(res.body).toEqual({ error: "job not retryable", kind: "conflict" });
      expect(dispatcher.enqueued).toEqual([]);
    });
  });

  describe("GET /jobs/:id/events", () => {
    it("sends a single snapshot for a terminal job and closes", async () => {
      jobs.seed({ id: "job-1", status: "failed", error: "resolve failed: parser returned no media url" });

      const res = await request(buildApp()).get("/jobs/job-1/events").expect(200);

      expect(res.headers["content-type"]).toMatch(/^text\/event-stream/);
      const frames = res.text.split("\n\n").filter(Boolean);
      expect(frames).toHaveLength(1);
      expect(frames[0].startsWith("data: ")).toBe(true);
      expect(JSON.parse(frames[0].slice("data: ".length))).toMatchObject({
        jobId: "job-1",
        status: "failed",
        error: "resolve failed: parser returned no media url",
        mp3Url: null,
      });
    });

    it("follows the job until it becomes ready", async () => {
      jobs.seed({ id: "job-1", status: "transcoding" });
      setTimeout(() => {
        void jobs.updateStatus("job-1", "ready", null, "jobs/job-1.mp3");
      }, 30);

      const res = await request(buildApp()).get("/jobs/job-1/events").expect(200);

      const statuses = res.text
        .split("\n\n")
        .filter((frame) => frame.startsWith("data: "))
        .map((frame) => JSON.parse(frame.slice("data: ".length)).status);
      expect(statuses).toEqual(["transcoding", "ready"]);
    });

    it("answers 404 before opening a stream for unknown jobs", async () => {
      await request(buildApp()).get("/jobs/missing/events").expect(404);
    });
  });

  describe("admission control", () => {
    it("throttles a client past its per-minute budget", async () => {
      const app = buildApp({ rateLimitPerMin: 3 }, { now: () => 1_700_000_000_000 });

      for (let i = 0; i < 3; i++) {
        await request(app).get("/jobs").expect(200).expect("X-RateLimit-Limit", "3");
      }
      const res = await request(app).get("/jobs").expect(429);

      expect(res.headers["retry-after"]).toBe("60");
      expect(res.body).toEqual({ error: "rate limit exceeded", kind: "rate_limited", retryAfter: 60 });
      await request(app).get("/health").expect(200);
    });

    it("counts clients separately by forwarded address", async () => {
      const app = buildApp({ rateLimitPerMin: 1 }, { now: () => 1_700_000_000_000 });

      await request(app).get("/jobs").set("X-Forwarded-For", "203.0.113.1").expect(200);
      await request(app).get("/jobs").set("X-Forwarded-For", "203.0.113.1").expect(429);
      await request(app).get("/jobs").set("X-Forwarded-For", "203.0.113.2, 10.0.0.1").expect(200);
    });
  });

  describe("API token", () => {
    it("rejects requests without the token", async () => {
      const res = await request(buildApp({ apiToken: "test-token" })).get("/jobs").expect(401);

      expect(res.body).toEqual({ error: "unauthorized", kind: "unauthorized" });
    });

    it("accepts the token as a bearer header, API key or query parameter", async () => {
      const app = buildApp({ apiToken: "test-token" });

      await request(app).get("/jobs").set("Authorization", "Bearer test-token").expect(200);
      await request(app).get("/jobs").set("X-API-KEY", "test-token").expect(200);
      await request(app).get("/jobs?token=test-token").expect(200);
      await request(app).get("/jobs").set("Authorization", "Bearer wrong-token").expect(401);
    });

    it("leaves health checks open", async () => {
      await request(buildApp({ apiToken: "test-token" })).get("/health").expect(200);
    });
  });

  describe("POST /admin/cleanup", () => {
    it("requires a horizon when none is configured", async () => {
      const res = await request(buildApp()).post("/admin/cleanup").send({}).expect(400);

      expect(res.body).toEqual({ error: "retentionDays is required", kind: "validation" });
    });

    it("rejects a non-positive horizon", async () => {
      const res = await request(buildApp()).post("/admin/cleanup").send({ retentionDays: 0 }).expect(400);

      expect(res.body.error).toBe("retentionDays must be a positive integer");
    });

    it("deletes old jobs and their audio", async () => {
      jobs.seed({ id: "old-ready", status: "ready", result_ref: "jobs/old-ready.mp3" });
      jobs.seed({ id: "old-failed", status: "failed", error: "transcode failed: x" });

      const res = await request(buildApp({ jobRetentionDays: 30 })).post("/admin/cleanup").send({}).expect(200);

      expect(res.body).toEqual({ deletedJobs: 2, deletedObjects: 1 });
      expect(storage.deleted).toEqual(["jobs/old-ready.mp3"]);
      expect(jobs.rows.size).toBe(0);
    });
  });
});
