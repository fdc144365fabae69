import { MissingTargetIdentifierError } from "../errors.js";
import type {
  Agent,
  Annotation,
  Detection,
  DigitalObject,
  FragmentSelector,
  InferenceResult,
} from "../types.js";
import { fromDetectionBox, fromFullImage } from "./selector.js";

export const NO_DETECTIONS_MESSAGE = "Leafpriority model found no plant components in this image";

const TARGET_ID_FIELDS = ["dcterms:identifier", "@id", "id"] as const;
const TARGET_TYPE_FIELDS = ["ods:fdoType", "@type", "type"] as const;

export interface AnnotationTargetRef {
  targetId: string;
  targetType: string;
}

function firstString(object: DigitalObject, fields: readonly string[]): string | undefined {
  for (const field of fields) {
    const value = object[field];
    if (typeof value === "string" && value.length > 0) {
      return value;
    }
  }
  return undefined;
}

export function resolveTarget(object: DigitalObject): AnnotationTargetRef {
  const targetId = firstString(object, TARGET_ID_FIELDS);
  if (!targetId) {
    throw new MissingTargetIdentifierError(
      `Digital object has no identifier (expected one of ${TARGET_ID_FIELDS.join(", ")})`,
    );
  }
  const targetType = firstString(object, TARGET_TYPE_FIELDS);
  if (!targetType) {
    throw new MissingTargetIdentifierError(
      `Digital object ${targetId} has no type (expected one of ${TARGET_TYPE_FIELDS.join(", ")})`,
    );
  }
  return { targetId, targetType };
}

function assertTarget(targetId: string, targetType: string): void {
  if (!targetId || !targetType) {
    throw new MissingTargetIdentifierError("Annotation target requires an identifier and a type");
  }
}

export function mapDetection(
  agent: Agent,
  timestamp: string,
  detection: Detection,
  selector: FragmentSelector,
  targetId: string,
  targetType: string,
  modelRef: string,
): Annotation {
  assertTarget(targetId, targetType);
  return {
    "@type": "oa:Annotation",
    "oa:motivation": "oa:classifying",
    "dcterms:creator": agent,
    "dcterms:created": timestamp,
    "oa:hasBody": {
      "@type": "ods:DetectionBody",
      "oa:value": detection,
      "dcterms:references": modelRef,
    },
    "oa:hasTarget": {
      "@id": targetId,
      "ods:type": targetType,
      "oa:hasSelector": selector,
    },
  };
}

export function mapEmpty(
  agent: Agent,
  timestamp: string,
  message: string,
  selector: FragmentSelector,
  targetId: string,
  targetType: string,
): Annotation {
  assertTarget(targetId, targetType);
  return {
    "@type": "oa:Annotation",
    "oa:motivation": "oa:commenting",
    "dcterms:creator": agent,
    "dcterms:created": timestamp,
    "oa:hasBody": {
      "@type": "oa:TextualBody",
      "oa:value": message,
      "dcterms:references": "",
    },
    "oa:hasTarget": {
      "@id": targetId,
      "ods:type": targetType,
      "oa:hasSelector": selector,
    },
  };
}

/**
 * Maps one inference result for one digital object. Every annotation shares
 * the given timestamp; detection order is preserved. An empty result yields a
 * single commenting annotation over the whole image.
 */
export function mapInferenceResult(
  agent: Agent,
  timestamp: string,
  object: DigitalObject,
  result: InferenceResult,
  modelRef: string,
): Annotation[] {
  const { targetId, targetType } = resolveTarget(object);
  const { detections, imageHeight, imageWidth } = result;

  if (detections.length === 0) {
    return [
      mapEmpty(
        agent,
        timestamp,
        NO_DETECTIONS_MESSAGE,
        fromFullImage(imageWidth, imageHeight),
        targetId,
        targetType,
      ),
    ];
  }

  return detections.map((detection) =>
    mapDetection(
      agent,
      timestamp,
      detection,
      fromDetectionBox(detection.boundingBox, imageWidth, imageHeight),
      targetId,
      targetType,
      modelRef,
    ),
  );
}
