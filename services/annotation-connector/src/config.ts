import { z } from "zod";

export const DEFAULT_INFERENCE_URL = "https://herbaria.idlab.ugent.be/inference/process_image/";
export const DEFAULT_MODEL_NAME = "leafpriority";
export const DEFAULT_FAILURE_TOPIC = "mas-failed";

const brokerList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? "")
      .split(",")
      .map((broker) => broker.trim())
      .filter((broker) => broker.length > 0),
  );

export const appConfigSchema = z.object({
  port: z.number().int().nonnegative(),
  kafka: z.object({
    clientId: z.string().min(1),
    consumerBrokers: z.array(z.string()),
    producerBrokers: z.array(z.string()),
    consumerTopic: z.string().min(1),
    consumerGroup: z.string().min(1),
    producerTopic: z.string().min(1),
    failureTopic: z.string().min(1),
  }),
  inference: z.object({
    url: z.string().url(),
    modelName: z.string().min(1),
    modelReference: z.string(),
    timeoutMs: z.number().int().positive().optional(),
  }),
  jobTracker: z.object({
    url: z.string().url().optional(),
    token: z.string().optional(),
  }),
  agent: z.object({
    id: z.string().min(1),
    name: z.string().min(1),
  }),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

const optionalNumber = (value: string | undefined): number | undefined =>
  value === undefined || value === "" ? undefined : Number(value);

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const inferenceUrl = env.INFERENCE_URL ?? DEFAULT_INFERENCE_URL;
  return appConfigSchema.parse({
    port: Number(env.PORT ?? "8080"),
    kafka: {
      clientId: env.KAFKA_CLIENT_ID ?? "annotation-connector",
      consumerBrokers: brokerList.parse(env.KAFKA_CONSUMER_HOST),
      producerBrokers: brokerList.parse(env.KAFKA_PRODUCER_HOST ?? env.KAFKA_CONSUMER_HOST),
      consumerTopic: env.KAFKA_CONSUMER_TOPIC ?? "plant-organ-detection",
      consumerGroup: env.KAFKA_CONSUMER_GROUP ?? "plant-organ-detection",
      producerTopic: env.KAFKA_PRODUCER_TOPIC ?? "annotations",
      failureTopic: env.KAFKA_FAILURE_TOPIC ?? DEFAULT_FAILURE_TOPIC,
    },
    inference: {
      url: inferenceUrl,
      modelName: env.INFERENCE_MODEL_NAME ?? DEFAULT_MODEL_NAME,
      modelReference: env.MODEL_REFERENCE ?? inferenceUrl,
      timeoutMs: optionalNumber(env.INFERENCE_TIMEOUT_MS),
    },
    jobTracker: {
      url: env.JOB_TRACKER_URL || undefined,
      token: env.JOB_TRACKER_TOKEN || undefined,
    },
    agent: {
      id: env.AGENT_ID ?? "plant-organ-detection",
      name: env.AGENT_NAME ?? "Plant organ detection",
    },
  });
}
