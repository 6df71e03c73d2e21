export { DetectionModule } from './detection.module';
export { AnnotationService, buildOverlaySvg } from './annotation.service';
export { DETECTION_MODEL, DetectionModelError, PERSON_CLASS_ID } from './detection-model';
export type { Detection, DetectionModel, DetectionResult, SizeHint } from './detection-model';
export { HttpDetectionModel } from './http-detection.model';
export { PersonDetectorService } from './person-detector.service';
export type { PersonCount } from './person-detector.service';
