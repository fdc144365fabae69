import { Logger, Module } from "@nestjs/common";

import { buildAgent } from "./annotation/agent.js";
import { DigitalObjectClient } from "./clients/digital-object.client.js";
import { InferenceClient } from "./clients/inference.client.js";
import { JobTrackerClient } from "./clients/job-tracker.client.js";
import { loadConfig, type AppConfig } from "./config.js";
import { HealthController } from "./controllers/health.controller.js";
import { PreviewController } from "./controllers/preview.controller.js";
import { InMemoryMessageBus } from "./messaging/memory.bus.js";
import { KafkaMessageBus } from "./messaging/kafka.bus.js";
import { AnnotationConsumer } from "./services/annotation.consumer.js";
import { AnnotationPipeline } from "./services/annotation.pipeline.js";
import { AGENT, APP_CONFIG, CLOCK, MESSAGE_BUS } from "./tokens.js";
import type { Clock } from "./types.js";

const configProvider = {
  provide: APP_CONFIG,
  useFactory: () => loadConfig(),
};

const agentProvider = {
  provide: AGENT,
  inject: [APP_CONFIG],
  useFactory: (config: AppConfig) => buildAgent(config.agent),
};

const clockProvider = {
  provide: CLOCK,
  useValue: (() => new Date()) satisfies Clock,
};

const messageBusProvider = {
  provide: MESSAGE_BUS,
  inject: [APP_CONFIG],
  useFactory: (config: AppConfig) => {
    if (config.kafka.consumerBrokers.length > 0) {
      return new KafkaMessageBus(config.kafka);
    }
    new Logger("MessageBus").warn("KAFKA_CONSUMER_HOST not set; using in-memory message bus");
    return new InMemoryMessageBus();
  },
};

@Module({
  imports: [],
  controllers: [HealthController, PreviewController],
  providers: [
    configProvider,
    agentProvider,
    clockProvider,
    messageBusProvider,
    InferenceClient,
    JobTrackerClient,
    DigitalObjectClient,
    AnnotationPipeline,
    AnnotationConsumer,
  ],
})
export class AppModule {}
