import { loadConfig, type AppConfig } from "../src/config.js";
import type { InferenceResult } from "../src/types.js";

export const INFERENCE_URL = "https://inference.test/process_image/";
export const JOB_TRACKER_URL = "https://jobs.test/jobs";

export function testConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({
    INFERENCE_URL,
    MODEL_REFERENCE: "https://models.test/leafpriority",
    KAFKA_PRODUCER_TOPIC: "annotations",
    KAFKA_CONSUMER_TOPIC: "plant-organ-detection",
    AGENT_ID: "test-agent",
    AGENT_NAME: "Test agent",
    ...env,
  });
}

export const specimen = {
  id: "X1",
  type: "Specimen",
  "ac:accessURI": "img1",
};

export function twoDetections(): InferenceResult {
  return {
    detections: [
      { boundingBox: [10, 20, 110, 220], class: "leaf_whole", score: 0.91 },
      { boundingBox: [300, 40, 360, 100], class: "flower", score: 0.47 },
    ],
    imageHeight: 1000,
    imageWidth: 800,
  };
}
