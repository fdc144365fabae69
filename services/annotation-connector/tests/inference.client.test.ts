import nock from "nock";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { InferenceClient } from "../src/clients/inference.client.js";
import { InferenceRequestError, InferenceResponseError } from "../src/errors.js";
import { testConfig } from "./helpers.js";

const origin = "https://inference.test";

beforeEach(() => {
  nock.disableNetConnect();
});

afterEach(() => {
  nock.cleanAll();
  nock.enableNetConnect();
});

describe("InferenceClient", () => {
  it("posts the image and normalizes detections", async () => {
    const scope = nock(origin)
      .post("/process_image/", { image_url: "https://images.test/sheet.jpg", model_name: "leafpriority" })
      .reply(200, {
        detections: [
          { bbox: [12, 30, 140, 260], class_name: "leaf_whole", confidence: 0.88 },
          { bbox: [400, 10, 480, 90], class_name: "fruit", confidence: 0.31 },
        ],
        metadata: { orig_img_shape: [4000, 2600, 3] },
      });

    const client = new InferenceClient(testConfig());
    const result = await client.invoke("https://images.test/sheet.jpg");

    expect(result).toEqual({
      detections: [
        { boundingBox: [12, 30, 140, 260], class: "leaf_whole", score: 0.88 },
        { boundingBox: [400, 10, 480, 90], class: "fruit", score: 0.31 },
      ],
      imageHeight: 4000,
      imageWidth: 2600,
    });
    expect(scope.isDone()).toBe(true);
  });

  it("sends an explicit model name", async () => {
    const scope = nock(origin)
      .post("/process_image/", { image_url: "img1", model_name: "plant-organs-v2" })
      .reply(200, { detections: [], metadata: { orig_img_shape: [10, 20] } });

    const result = await new InferenceClient(testConfig()).invoke("img1", "plant-organs-v2");

    expect(result).toEqual({ detections: [], imageHeight: 10, imageWidth: 20 });
    expect(scope.isDone()).toBe(true);
  });

  it("treats a missing detections array as empty", async () => {
    nock(origin).post("/process_image/").reply(200, { metadata: { orig_img_shape: [600, 800] } });

    const result = await new InferenceClient(testConfig()).invoke("img1");

    expect(result.detections).toEqual([]);
  });

  it("fails with the upstream status on error responses", async () => {
    nock(origin).post("/process_image/").reply(503, "model warming up");

    const error = await new InferenceClient(testConfig()).invoke("img1").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(InferenceRequestError);
    expect(error).toMatchObject({ status: 503, message: "Inference request failed: 503 model warming up" });
  });

  it("fails on transport errors", async () => {
    nock(origin).post("/process_image/").replyWithError("socket hang up");

    await expect(new InferenceClient(testConfig()).invoke("img1")).rejects.toThrow(InferenceRequestError);
  });

  it("rejects a missing image shape", async () => {
    nock(origin).post("/process_image/").reply(200, { detections: [] });

    await expect(new InferenceClient(testConfig()).invoke("img1")).rejects.toThrow(InferenceResponseError);
  });

  it("rejects a shape with fewer than two entries", async () => {
    nock(origin).post("/process_image/").reply(200, { detections: [], metadata: { orig_img_shape: [600] } });

    await expect(new InferenceClient(testConfig()).invoke("img1")).rejects.toThrow(/orig_img_shape/);
  });

  it("rejects a zero image shape", async () => {
    nock(origin)
      .post("/process_image/")
      .reply(200, {
        detections: [{ bbox: [1, 2, 3, 4], class_name: "leaf_whole", confidence: 0.6 }],
        metadata: { orig_img_shape: [0, 0, 3] },
      });

    await expect(new InferenceClient(testConfig()).invoke("img1")).rejects.toThrow(InferenceResponseError);
  });

  it("rejects negative or fractional image dimensions", async () => {
    nock(origin).post("/process_image/").reply(200, { detections: [], metadata: { orig_img_shape: [-600, 800] } });
    nock(origin).post("/process_image/").reply(200, { detections: [], metadata: { orig_img_shape: [600, 800.5] } });
    const client = new InferenceClient(testConfig());

    await expect(client.invoke("img1")).rejects.toThrow(/metadata\.orig_img_shape\.0/);
    await expect(client.invoke("img1")).rejects.toThrow(/metadata\.orig_img_shape\.1/);
  });

  it("times out when a timeout is configured", async () => {
    nock(origin)
      .post("/process_image/")
      .delay(500)
      .reply(200, { detections: [], metadata: { orig_img_shape: [600, 800] } });

    const client = new InferenceClient(testConfig({ INFERENCE_TIMEOUT_MS: "50" }));

    await expect(client.invoke("img1")).rejects.toThrow(
      new InferenceRequestError("Inference request timed out after 50ms"),
    );
  });

  it("rejects malformed detections", async () => {
    nock(origin)
      .post("/process_image/")
      .reply(200, {
        detections: [{ bbox: [1, 2, 3], class_name: "leaf_whole", confidence: 0.4 }],
        metadata: { orig_img_shape: [600, 800] },
      });

    await expect(new InferenceClient(testConfig()).invoke("img1")).rejects.toThrow(/detections\.0\.bbox/);
  });
});
