import type { BoundingBox } from '../roi';

export const DETECTION_MODEL = Symbol('DETECTION_MODEL');

/** Class id of "person" in the COCO label scheme the models are trained on. */
export const PERSON_CLASS_ID = 0;

export interface SizeHint {
  width: number;
  height: number;
  rectangular: boolean;
}

export interface Detection {
  classId: number;
  box: BoundingBox;
  confidence?: number;
}

export interface DetectionResult {
  /** Size of the frame the model actually saw, when it reports one. */
  frameShape: { width: number; height: number } | null;
  detections: Detection[];
}

/**
 * Black-box object detector. Resolves `null` when the model produced no
 * result at all for the image.
 */
export interface DetectionModel {
  readonly identifier: string;
  predict(imagePath: string, confidence: number, sizeHint?: SizeHint): Promise<DetectionResult | null>;
}

export class DetectionModelError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DetectionModelError';
  }
}
