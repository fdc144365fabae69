import type { BoundingBox, FragmentSelector } from "../types.js";

const MEDIA_FRAGMENTS = "https://www.w3.org/TR/media-frags/";

// Boxes are [x1, y1, x2, y2] in source pixels and are not range-checked;
// downstream consumers receive whatever the model produced.
export function fromDetectionBox(
  box: BoundingBox,
  imageWidth: number,
  imageHeight: number,
): FragmentSelector {
  const [x1, y1, x2, y2] = box;
  return {
    "ods:type": "FragmentSelector",
    "dcterms:conformsTo": MEDIA_FRAGMENTS,
    "ac:hasROI": {
      "ac:xFrac": x1 / imageWidth,
      "ac:yFrac": y1 / imageHeight,
      "ac:widthFrac": (x2 - x1) / imageWidth,
      "ac:heightFrac": (y2 - y1) / imageHeight,
    },
    boundingBox: [x1, y1, x2, y2],
    imageHeight,
    imageWidth,
  };
}

export function fromFullImage(imageWidth: number, imageHeight: number): FragmentSelector {
  return fromDetectionBox([0, 0, imageWidth, imageHeight], imageWidth, imageHeight);
}
