import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BoundingBox, DEFAULT_ROI, Polygon, RoiDefinition, anchorPoint, pointInPolygon, scaledRoi } from '../roi';
import { DETECTION_MODEL, DetectionModel, PERSON_CLASS_ID } from './detection-model';

export interface PersonCount {
  count: number;
  width: number | null;
  height: number | null;
  /** Person boxes that survived ROI filtering. */
  boxes: BoundingBox[];
}

@Injectable()
export class PersonDetectorService {
  private readonly logger = new Logger(PersonDetectorService.name);

  constructor(
    @Inject(DETECTION_MODEL) private readonly model: DetectionModel,
    private readonly configService: ConfigService,
  ) {}

  get modelIdentifier(): string {
    return this.model.identifier;
  }

  roiFor(width: number | null, height: number | null): Polygon | null {
    const roi = this.configService.get<RoiDefinition>('roi') ?? DEFAULT_ROI;
    return scaledRoi(width, height, roi);
  }

  /**
   * Count people whose feet stand inside the ROI. Dimensions reported by the
   * model win over the ones passed in; without dimensions nothing is filtered.
   */
  async count(
    imagePath: string,
    confidence: number,
    width: number | null = null,
    height: number | null = null,
  ): Promise<PersonCount> {
    const sizeHint = width && height ? { width, height, rectangular: true } : undefined;
    const result = await this.model.predict(imagePath, confidence, sizeHint);
    if (!result) {
      return { count: 0, width: null, height: null, boxes: [] };
    }

    const resolvedWidth = result.frameShape?.width ?? width;
    const resolvedHeight = result.frameShape?.height ?? height;

    const personBoxes = result.detections
      .filter((detection) => detection.classId === PERSON_CLASS_ID)
      .map(({ box }): BoundingBox => [Math.round(box[0]), Math.round(box[1]), Math.round(box[2]), Math.round(box[3])]);

    const roi = this.roiFor(resolvedWidth, resolvedHeight);
    const boxes = roi === null ? personBoxes : personBoxes.filter((box) => pointInPolygon(anchorPoint(box), roi));

    this.logger.debug(
      `Detections: ${result.detections.length} total, ${personBoxes.length} people, ${boxes.length} inside ROI`,
    );
    return { count: boxes.length, width: resolvedWidth, height: resolvedHeight, boxes };
  }
}
