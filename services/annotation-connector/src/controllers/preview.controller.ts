import {
  BadGatewayException,
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Inject,
  Post,
  ValidationPipe,
} from "@nestjs/common";

import { DigitalObjectClient } from "../clients/digital-object.client.js";
import { PreviewRequestDto } from "../dto/preview-request.dto.js";
import { ConnectorError } from "../errors.js";
import { AnnotationPipeline } from "../services/annotation.pipeline.js";
import type { AnnotationEvent, DigitalObject } from "../types.js";

const previewValidation = new ValidationPipe({
  expectedType: PreviewRequestDto,
  whitelist: true,
  transform: true,
});

@Controller("annotations")
export class PreviewController {
  constructor(
    @Inject(AnnotationPipeline) private readonly pipeline: AnnotationPipeline,
    @Inject(DigitalObjectClient) private readonly objects: DigitalObjectClient,
  ) {}

  @Post("preview")
  @HttpCode(HttpStatus.OK)
  async preview(@Body(previewValidation) body: PreviewRequestDto): Promise<AnnotationEvent> {
    try {
      const object = await this.resolveObject(body);
      return await this.pipeline.preview(object, body.jobId);
    } catch (error) {
      if (error instanceof ConnectorError) {
        throw new BadGatewayException(error.message);
      }
      throw error;
    }
  }

  private async resolveObject(body: PreviewRequestDto): Promise<DigitalObject> {
    if (body.object && !body.objectUrl) {
      return body.object;
    }
    if (body.objectUrl && !body.object) {
      return this.objects.fetchObject(body.objectUrl);
    }
    throw new BadRequestException("exactly one of object or objectUrl is required");
  }
}
