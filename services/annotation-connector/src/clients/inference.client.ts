import { Inject, Injectable, Logger } from "@nestjs/common";
import fetch from "node-fetch";
import { z } from "zod";

import type { AppConfig } from "../config.js";
import { InferenceRequestError, InferenceResponseError, errorMessage } from "../errors.js";
import { APP_CONFIG } from "../tokens.js";
import type { InferenceResult } from "../types.js";

const detectionSchema = z.object({
  bbox: z.tuple([z.number(), z.number(), z.number(), z.number()]),
  class_name: z.string(),
  confidence: z.number(),
});

const imageDimension = z.number().int().positive();

const inferenceResponseSchema = z.object({
  detections: z.array(detectionSchema).default([]),
  metadata: z.object({
    orig_img_shape: z.tuple([imageDimension, imageDimension]).rest(z.number()),
  }),
});

@Injectable()
export class InferenceClient {
  private readonly logger = new Logger(InferenceClient.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  async invoke(imageUri: string, modelName: string = this.config.inference.modelName): Promise<InferenceResult> {
    const json = await this.post({ image_url: imageUri, model_name: modelName });

    const parsed = inferenceResponseSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join(".") || "<root>"}: ${issue.message}` : "unknown issue";
      throw new InferenceResponseError(`Malformed inference response (${where})`, { cause: parsed.error });
    }

    const [imageHeight, imageWidth] = parsed.data.metadata.orig_img_shape;
    this.logger.log(
      `Model ${modelName} returned ${parsed.data.detections.length} detections for ${imageUri} (${imageWidth}x${imageHeight})`,
    );
    return {
      detections: parsed.data.detections.map((detection) => ({
        boundingBox: detection.bbox,
        class: detection.class_name,
        score: detection.confidence,
      })),
      imageHeight,
      imageWidth,
    };
  }

  private async post(body: { image_url: string; model_name: string }): Promise<unknown> {
    const { url, timeoutMs } = this.config.inference;
    const controller = new AbortController();
    const timeout = timeoutMs ? setTimeout(() => controller.abort(), timeoutMs) : undefined;
    try {
      const response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      if (!response.ok) {
        const text = await response.text();
        throw new InferenceRequestError(`Inference request failed: ${response.status} ${text}`, response.status);
      }
      try {
        return await response.json();
      } catch (error) {
        throw new InferenceResponseError(`Inference response is not JSON: ${errorMessage(error)}`, { cause: error });
      }
    } catch (error) {
      if (error instanceof InferenceRequestError || error instanceof InferenceResponseError) {
        throw error;
      }
      if (error instanceof Error && error.name === "AbortError") {
        throw new InferenceRequestError(`Inference request timed out after ${timeoutMs}ms`, undefined, { cause: error });
      }
      throw new InferenceRequestError(`Inference request failed: ${errorMessage(error)}`, undefined, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }
}
