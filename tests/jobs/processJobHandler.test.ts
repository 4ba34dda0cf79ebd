import { afterEach, describe, expect, it } from "vitest";
import { UnrecoverableError } from "bullmq";
import { createProcessJobHandler } from "../../src/jobs/workers/processJobHandler.js";
import { JobTimeoutError, ResolutionError, TranscodeError } from "../../src/utils/errors.js";
import { createPipelineFixture, type PipelineFixture } from "./pipelineFixture.js";

const delivered = (attemptsMade = 0) => ({
  id: "job-1",
  data: { jobId: "job-1", sourceUrl: "https://www.douyin.com/video/1" },
  attemptsMade,
});

describe("process job handler", () => {
  let fixture: PipelineFixture | undefined;

  afterEach(async () => {
    await fixture?.cleanup();
    fixture = undefined;
  });

  it("returns the pipeline outcome", async () => {
    fixture = await createPipelineFixture();
    fixture.jobs.seed({ id: "job-1" });

    const outcome = await createProcessJobHandler(fixture, { timeoutMs: 60_000 })(delivered());

    expect(outcome).toEqual({ outcome: "ready", resultRef: "jobs/job-1.mp3" });
  });

  it("stops further attempts for terminal failures", async () => {
    fixture = await createPipelineFixture({
      resolve: async () => {
        throw new ResolutionError("parser returned no media url");
      },
    });
    fixture.jobs.seed({ id: "job-1" });

    const failure = createProcessJobHandler(fixture, { timeoutMs: 60_000 })(delivered());

    await expect(failure).rejects.toBeInstanceOf(UnrecoverableError);
    await expect(failure).rejects.toThrow("parser returned no media url");
  });

  it("rethrows retryable failures unchanged", async () => {
    fixture = await createPipelineFixture({
      transcoder: {
        transcode: async () => {
          throw new TranscodeError("ffmpeg did not exit cleanly");
        },
      },
    });
    fixture.jobs.seed({ id: "job-1" });

    await expect(createProcessJobHandler(fixture, { timeoutMs: 60_000 })(delivered(1))).rejects.toBeInstanceOf(
      TranscodeError
    );
  });

  it("aborts the pipeline when the deadline passes", async () => {
    fixture = await createPipelineFixture({
      resolve: (_sourceUrl, signal) =>
        new Promise((_resolve, reject) => {
          signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
        }),
    });
    fixture.jobs.seed({ id: "job-1" });

    const failure = createProcessJobHandler(fixture, { timeoutMs: 20 })(delivered());

    await expect(failure).rejects.toBeInstanceOf(JobTimeoutError);
    expect(await fixture.jobs.get("job-1")).toMatchObject({ status: "failed", error: "job timed out after 0s" });
  });
});
