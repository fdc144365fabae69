import { Injectable } from "@nestjs/common";
import fetch from "node-fetch";
import { z } from "zod";

import { DigitalObjectRequestError } from "../errors.js";
import type { DigitalObject } from "../types.js";

const envelopeSchema = z.object({
  data: z.object({
    attributes: z.record(z.unknown()),
  }),
});

@Injectable()
export class DigitalObjectClient {
  async fetchObject(objectUrl: string): Promise<DigitalObject> {
    const response = await fetch(objectUrl, { headers: { Accept: "application/json" } });
    if (!response.ok) {
      const text = await response.text();
      throw new DigitalObjectRequestError(`Digital object request failed: ${response.status} ${text}`);
    }
    const parsed = envelopeSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new DigitalObjectRequestError(`Digital object response from ${objectUrl} has no data.attributes`);
    }
    return parsed.data.data.attributes;
  }
}
