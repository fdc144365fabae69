import { randomUUID } from "node:crypto";

import { Inject, Injectable, Logger } from "@nestjs/common";
import { z } from "zod";

import { mapInferenceResult } from "../annotation/mapper.js";
import { assemble } from "../annotation/event.js";
import { InferenceClient } from "../clients/inference.client.js";
import { JobTrackerClient } from "../clients/job-tracker.client.js";
import type { AppConfig } from "../config.js";
import { MalformedMessageError, PublishError, errorMessage } from "../errors.js";
import type { MessageBus } from "../messaging/message-bus.js";
import { AGENT, APP_CONFIG, CLOCK, MESSAGE_BUS } from "../tokens.js";
import type {
  Agent,
  AnnotationEvent,
  Clock,
  DigitalObject,
  FailureRecord,
  JobMessage,
  PipelineOutcome,
} from "../types.js";

export const UNKNOWN_JOB_ID = "unknown";

const jobMessageSchema = z.object({
  jobId: z.string().min(1),
  object: z
    .object({
      "ac:accessURI": z.string().min(1),
    })
    .passthrough(),
});

function parseJobMessage(value: unknown): JobMessage {
  const parsed = jobMessageSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "<root>"}: ${issue.message}` : "unknown issue";
    throw new MalformedMessageError(`Malformed job message (${where})`, { cause: parsed.error });
  }
  return parsed.data;
}

function jobIdOf(value: unknown): string {
  if (typeof value === "object" && value !== null && "jobId" in value && typeof value.jobId === "string") {
    return value.jobId;
  }
  return UNKNOWN_JOB_ID;
}

@Injectable()
export class AnnotationPipeline {
  private readonly logger = new Logger(AnnotationPipeline.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(AGENT) private readonly agent: Agent,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(MESSAGE_BUS) private readonly bus: MessageBus,
    @Inject(InferenceClient) private readonly inference: InferenceClient,
    @Inject(JobTrackerClient) private readonly jobTracker: JobTrackerClient,
  ) {}

  /**
   * Runs one inbound job message to a terminal state. Every error raised on
   * the way is reported as a failure record; only a failure to publish that
   * record escapes, so the transport redelivers the message.
   */
  async process(message: unknown): Promise<PipelineOutcome> {
    try {
      const job = parseJobMessage(message);
      this.logger.log(`Received job ${job.jobId}`);
      await this.jobTracker.markRunning(job.jobId);
      const event = await this.annotate(job.object, job.jobId);
      await this.publishEvent(event);
      return { status: "published", event };
    } catch (error) {
      return this.fail(jobIdOf(message), error);
    }
  }

  async preview(object: DigitalObject, jobId: string = randomUUID()): Promise<AnnotationEvent> {
    return this.annotate(object, jobId);
  }

  private async annotate(object: DigitalObject, jobId: string): Promise<AnnotationEvent> {
    const imageUri = object["ac:accessURI"];
    if (typeof imageUri !== "string" || imageUri.length === 0) {
      throw new MalformedMessageError("Digital object has no ac:accessURI");
    }

    const result = await this.inference.invoke(imageUri);
    if (result.detections.length === 0) {
      this.logger.log(`No plant components found in ${imageUri} - job ${jobId}`);
    }

    const timestamp = this.clock().toISOString();
    const annotations = mapInferenceResult(
      this.agent,
      timestamp,
      object,
      result,
      this.config.inference.modelReference,
    );
    return assemble(annotations, jobId);
  }

  private async publishEvent(event: AnnotationEvent): Promise<void> {
    const topic = this.config.kafka.producerTopic;
    try {
      await this.bus.publish(topic, event);
    } catch (error) {
      throw new PublishError(`Failed to publish annotation event to ${topic}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    this.logger.log(`Published ${event.annotations.length} annotations for job ${event.jobId}`);
  }

  private async fail(jobId: string, error: unknown): Promise<PipelineOutcome> {
    const failure: FailureRecord = { jobId, errorMessage: errorMessage(error) };
    this.logger.error(`Job ${jobId} failed: ${failure.errorMessage}`);
    await this.bus.publish(this.config.kafka.failureTopic, failure);
    return { status: "failed", failure };
  }
}
