import { Inject, Injectable, Logger } from "@nestjs/common";
import fetch from "node-fetch";

import type { AppConfig } from "../config.js";
import { JobStateUpdateError, errorMessage } from "../errors.js";
import { APP_CONFIG } from "../tokens.js";

@Injectable()
export class JobTrackerClient {
  private readonly logger = new Logger(JobTrackerClient.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  async markRunning(jobId: string): Promise<void> {
    const { url, token } = this.config.jobTracker;
    if (!url) {
      this.logger.warn(`Job tracker not configured; job ${jobId} not marked as running`);
      return;
    }

    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }

    const endpoint = `${url.replace(/\/$/, "")}/${encodeURIComponent(jobId)}/running`;
    let status: number;
    let text: string;
    try {
      const response = await fetch(endpoint, { method: "POST", headers });
      if (response.ok) {
        this.logger.log(`Job ${jobId} marked as running`);
        return;
      }
      status = response.status;
      text = await response.text();
    } catch (error) {
      throw new JobStateUpdateError(`Failed to mark job ${jobId} as running: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    throw new JobStateUpdateError(`Failed to mark job ${jobId} as running: ${status} ${text}`);
  }
}
