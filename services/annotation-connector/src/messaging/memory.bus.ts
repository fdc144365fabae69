import { Injectable, Logger } from "@nestjs/common";

import type { MessageBus, MessageHandler } from "./message-bus.js";

@Injectable()
export class InMemoryMessageBus implements MessageBus {
  private readonly logger = new Logger(InMemoryMessageBus.name);
  private readonly topics = new Map<string, unknown[]>();
  private readonly handlers = new Map<string, MessageHandler>();

  async publish(topic: string, value: unknown): Promise<void> {
    const messages = this.topics.get(topic) ?? [];
    messages.push(structuredClone(value));
    this.topics.set(topic, messages);
  }

  async subscribe(topic: string, handler: MessageHandler): Promise<void> {
    this.handlers.set(topic, handler);
    this.logger.log(`Subscribed to in-memory topic ${topic}`);
  }

  async deliver(topic: string, value: unknown): Promise<void> {
    const handler = this.handlers.get(topic);
    if (!handler) {
      throw new Error(`No subscriber for topic ${topic}`);
    }
    await handler(value);
  }

  messages(topic: string): unknown[] {
    return [...(this.topics.get(topic) ?? [])];
  }
}
