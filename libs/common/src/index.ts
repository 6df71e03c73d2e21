/**
 * Queue watch – shared library public API.
 * Use this barrel for consistent imports from the worker, the API and tests.
 */

export { ConfigModule, appConfig, resolveLogLevels } from './config';
export {
  CameraModule,
  CameraModuleError,
  CaptureError,
  CaptureTimeoutError,
  DependencyMissingError,
  DiscoveryError,
  FrameCapturerService,
  ProcessRunnerService,
  StreamLocatorService,
  describeError,
  redactTokens,
} from './camera';
export type { CaptureOptions, CaptureResult } from './camera';
export {
  CaptureRepository,
  CapturesModule,
  ElasticCaptureRepository,
  toSummary,
} from './captures';
export type {
  CapturePage,
  CaptureRecord,
  CaptureStatus,
  CaptureSummary,
  NewCaptureRecord,
  SeriesInterval,
  SeriesPoint,
  StoredImage,
} from './captures';
export {
  AnnotationService,
  DETECTION_MODEL,
  DetectionModelError,
  DetectionModule,
  HttpDetectionModel,
  PersonDetectorService,
} from './detection';
export type { DetectionModel, DetectionResult, PersonCount, SizeHint } from './detection';
export { ElasticModule, ElasticService, MAX_RESULT_WINDOW } from './elastic';
export { AllExceptionsFilter } from './filters';
export { LoggingInterceptor } from './interceptors';
export { KafkaModule, KafkaProducerService } from './kafka';
export type { QueueCountEvent } from './kafka';
export { DEFAULT_ROI, anchorPoint, pointInPolygon, scalePolygon, scaledRoi } from './roi';
export type { BoundingBox, Point, Polygon, RoiDefinition } from './roi';
export { downsamplePoints } from './utils';
