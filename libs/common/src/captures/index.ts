export { CapturesModule } from './captures.module';
export { CaptureRepository } from './capture.repository';
export { ElasticCaptureRepository, fromDocument, toDocument } from './elastic-capture.repository';
export type { CaptureDocument } from './elastic-capture.repository';
export { toSummary } from './capture-record.types';
export type {
  CapturePage,
  CaptureRecord,
  CaptureStatus,
  CaptureSummary,
  FailedCapture,
  NewCaptureRecord,
  SeriesInterval,
  SeriesPoint,
  StoredImage,
  SuccessfulCapture,
} from './capture-record.types';
