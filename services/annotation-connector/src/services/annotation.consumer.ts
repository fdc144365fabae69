import { Inject, Injectable, Logger, OnApplicationBootstrap } from "@nestjs/common";

import type { AppConfig } from "../config.js";
import type { MessageBus } from "../messaging/message-bus.js";
import { APP_CONFIG, MESSAGE_BUS } from "../tokens.js";
import { AnnotationPipeline } from "./annotation.pipeline.js";

@Injectable()
export class AnnotationConsumer implements OnApplicationBootstrap {
  private readonly logger = new Logger(AnnotationConsumer.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(MESSAGE_BUS) private readonly bus: MessageBus,
    @Inject(AnnotationPipeline) private readonly pipeline: AnnotationPipeline,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    const topic = this.config.kafka.consumerTopic;
    await this.bus.subscribe(topic, async (message) => {
      const outcome = await this.pipeline.process(message);
      if (outcome.status === "failed") {
        this.logger.warn(`Reported failure for job ${outcome.failure.jobId}`);
      }
    });
    this.logger.log(`Listening for jobs on ${topic}`);
  }
}
