import { Logger, OnModuleDestroy } from "@nestjs/common";
import { Kafka, logLevel, type Consumer, type LogEntry, type Producer } from "kafkajs";

import type { AppConfig } from "../config.js";
import type { MessageBus, MessageHandler } from "./message-bus.js";

function kafkaLogCreator() {
  const logger = new Logger("Kafka");
  return ({ namespace, level, log }: LogEntry) => {
    const text = `[${namespace}] ${log.message}`;
    if (level === logLevel.ERROR) {
      logger.error(text);
    } else if (level === logLevel.WARN) {
      logger.warn(text);
    } else if (level === logLevel.INFO) {
      logger.log(text);
    } else {
      logger.debug(text);
    }
  };
}

function decode(value: Buffer | null): unknown {
  if (value === null) {
    return null;
  }
  const text = value.toString("utf-8");
  try {
    return JSON.parse(text);
  } catch {
    // Undecodable payloads reach the pipeline as raw text and fail there.
    return text;
  }
}

export class KafkaMessageBus implements MessageBus, OnModuleDestroy {
  private readonly logger = new Logger(KafkaMessageBus.name);
  private readonly consumer: Consumer;
  private readonly producer: Producer;
  private producerConnected = false;

  constructor(private readonly config: AppConfig["kafka"]) {
    const logCreator = kafkaLogCreator;
    this.consumer = new Kafka({ clientId: config.clientId, brokers: config.consumerBrokers, logCreator }).consumer({
      groupId: config.consumerGroup,
    });
    this.producer = new Kafka({ clientId: config.clientId, brokers: config.producerBrokers, logCreator }).producer();
  }

  async publish(topic: string, value: unknown): Promise<void> {
    if (!this.producerConnected) {
      await this.producer.connect();
      this.producerConnected = true;
    }
    await this.producer.send({
      topic,
      messages: [{ value: JSON.stringify(value) }],
    });
  }

  async subscribe(topic: string, handler: MessageHandler): Promise<void> {
    await this.consumer.connect();
    await this.consumer.subscribe({ topic });
    // One partition at a time keeps consumption strictly sequential.
    await this.consumer.run({
      partitionsConsumedConcurrently: 1,
      eachMessage: async ({ message, partition }) => {
        this.logger.debug(`Message at ${topic}[${partition}] offset ${message.offset}`);
        await handler(decode(message.value));
      },
    });
    this.logger.log(`Consuming topic ${topic} as group ${this.config.consumerGroup}`);
  }

  async onModuleDestroy(): Promise<void> {
    await this.consumer.disconnect();
    if (this.producerConnected) {
      await this.producer.disconnect();
    }
  }
}
