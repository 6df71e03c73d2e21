/**
 * One row per ingestion attempt. Successful and failed attempts are separate
 * variants so that a failure can never carry a count or an image.
 */
export type CaptureStatus = 'ok' | 'error';

export interface StoredImage {
  data: Buffer;
  mime_type: string;
}

interface CaptureRecordBase {
  captured_at: Date;
  camera_id: number;
  confidence_threshold: number;
  model_identifier: string;
}

export interface SuccessfulCapture extends CaptureRecordBase {
  status: 'ok';
  people_count: number;
  image_width: number | null;
  image_height: number | null;
  /** Nulled by retention once the record is old enough. */
  raw_image: StoredImage | null;
  annotated_image: StoredImage | null;
  error_message: null;
}

export interface FailedCapture extends CaptureRecordBase {
  status: 'error';
  people_count: null;
  image_width: null;
  image_height: null;
  raw_image: null;
  annotated_image: null;
  error_message: string;
}

export type NewCaptureRecord = SuccessfulCapture | FailedCapture;

export type CaptureRecord = NewCaptureRecord & {
  id: string;
  created_at: Date;
};

/** Listing/detail view without the binary payloads. */
export interface CaptureSummary {
  id: string;
  captured_at: Date;
  created_at: Date;
  camera_id: number;
  people_count: number | null;
  confidence_threshold: number;
  model_identifier: string;
  image_width: number | null;
  image_height: number | null;
  status: CaptureStatus;
  error_message: string | null;
  has_image: boolean;
  has_annotated_image: boolean;
}

export interface SeriesPoint {
  timestamp: string;
  value: number;
}

export type SeriesInterval = 'minute' | 'hour';

export interface CapturePage {
  total: number;
  items: CaptureSummary[];
}

export function toSummary(record: CaptureRecord): CaptureSummary {
  return {
    id: record.id,
    captured_at: record.captured_at,
    created_at: record.created_at,
    camera_id: record.camera_id,
    people_count: record.people_count,
    confidence_threshold: record.confidence_threshold,
    model_identifier: record.model_identifier,
    image_width: record.image_width,
    image_height: record.image_height,
    status: record.status,
    error_message: record.error_message,
    has_image: record.raw_image !== null,
    has_annotated_image: record.annotated_image !== null,
  };
}
