export type MessageHandler = (value: unknown) => Promise<void>;

export interface MessageBus {
  publish(topic: string, value: unknown): Promise<void>;
  subscribe(topic: string, handler: MessageHandler): Promise<void>;
}
