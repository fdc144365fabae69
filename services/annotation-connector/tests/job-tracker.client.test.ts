import nock from "nock";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { JobTrackerClient } from "../src/clients/job-tracker.client.js";
import { JobStateUpdateError } from "../src/errors.js";
import { JOB_TRACKER_URL, testConfig } from "./helpers.js";

beforeEach(() => {
  nock.disableNetConnect();
});

afterEach(() => {
  nock.cleanAll();
  nock.enableNetConnect();
});

describe("JobTrackerClient", () => {
  it("marks a job as running with the bearer token", async () => {
    const scope = nock("https://jobs.test", { reqheaders: { authorization: "Bearer test-secret" } })
      .post("/jobs/J1/running")
      .reply(204);

    const client = new JobTrackerClient(testConfig({ JOB_TRACKER_URL, JOB_TRACKER_TOKEN: "test-secret" }));
    await client.markRunning("J1");

    expect(scope.isDone()).toBe(true);
  });

  it("skips the call when no tracker is configured", async () => {
    const client = new JobTrackerClient(testConfig());

    await expect(client.markRunning("J1")).resolves.toBeUndefined();
  });

  it("fails when the tracker rejects the transition", async () => {
    nock("https://jobs.test").post("/jobs/J2/running").reply(409, "job already completed");

    const client = new JobTrackerClient(testConfig({ JOB_TRACKER_URL }));

    await expect(client.markRunning("J2")).rejects.toThrow(
      new JobStateUpdateError("Failed to mark job J2 as running: 409 job already completed"),
    );
  });

  it("fails when the tracker is unreachable", async () => {
    nock("https://jobs.test").post("/jobs/J3/running").replyWithError("connect ECONNREFUSED");

    const client = new JobTrackerClient(testConfig({ JOB_TRACKER_URL }));

    await expect(client.markRunning("J3")).rejects.toThrow(JobStateUpdateError);
  });
});
