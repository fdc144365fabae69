export type BoundingBox = [number, number, number, number];

export interface Detection {
  boundingBox: BoundingBox;
  class: string;
  score: number;
}

export interface InferenceResult {
  detections: Detection[];
  imageHeight: number;
  imageWidth: number;
}

export type DigitalObject = Record<string, unknown>;

export interface JobMessage {
  jobId: string;
  object: DigitalObject;
}

export interface Agent {
  "@id": string;
  "@type": "as:Application";
  "schema:name": string;
}

export interface RegionOfInterest {
  "ac:xFrac": number;
  "ac:yFrac": number;
  "ac:widthFrac": number;
  "ac:heightFrac": number;
}

export interface FragmentSelector {
  "ods:type": "FragmentSelector";
  "dcterms:conformsTo": "https://www.w3.org/TR/media-frags/";
  "ac:hasROI": RegionOfInterest;
  boundingBox: BoundingBox;
  imageHeight: number;
  imageWidth: number;
}

export type Motivation = "oa:classifying" | "oa:commenting";

export interface DetectionBody {
  "@type": "ods:DetectionBody";
  "oa:value": Detection;
  "dcterms:references": string;
}

export interface TextualBody {
  "@type": "oa:TextualBody";
  "oa:value": string;
  "dcterms:references": string;
}

export interface AnnotationTarget {
  "@id": string;
  "ods:type": string;
  "oa:hasSelector": FragmentSelector;
}

export interface Annotation {
  "@type": "oa:Annotation";
  "oa:motivation": Motivation;
  "dcterms:creator": Agent;
  "dcterms:created": string;
  "oa:hasBody": DetectionBody | TextualBody;
  "oa:hasTarget": AnnotationTarget;
}

export interface AnnotationEvent {
  annotations: Annotation[];
  jobId: string;
}

export interface FailureRecord {
  jobId: string;
  errorMessage: string;
}

export type PipelineOutcome =
  | { status: "published"; event: AnnotationEvent }
  | { status: "failed"; failure: FailureRecord };

export type Clock = () => Date;
