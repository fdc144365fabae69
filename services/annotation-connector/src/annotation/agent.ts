import type { AppConfig } from "../config.js";
import type { Agent } from "../types.js";

export function buildAgent(config: AppConfig["agent"]): Readonly<Agent> {
  return Object.freeze({
    "@id": config.id,
    "@type": "as:Application",
    "schema:name": config.name,
  });
}
