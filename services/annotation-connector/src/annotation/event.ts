import type { Annotation, AnnotationEvent } from "../types.js";

export function assemble(annotations: Annotation[], jobId: string): AnnotationEvent {
  return { annotations, jobId };
}
