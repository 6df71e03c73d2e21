import type {
  CapturePage,
  CaptureRecord,
  CaptureSummary,
  NewCaptureRecord,
  SeriesInterval,
  SeriesPoint,
} from './capture-record.types';

/**
 * Storage sink for capture records. Used as the Nest injection token so the
 * worker and the API can run against any implementation.
 */
export abstract class CaptureRepository {
  /** Persist one record; it must become visible atomically. */
  abstract insert(record: NewCaptureRecord): Promise<CaptureRecord>;

  /**
   * Null both image payloads and their mime types on records captured before
   * `cutoff` that still hold one. Returns the number of records changed.
   */
  abstract pruneImages(cutoff: Date): Promise<number>;

  abstract findById(id: string): Promise<CaptureRecord | null>;

  /** Newest first. */
  abstract list(page: number, pageSize: number): Promise<CapturePage>;

  abstract latest(): Promise<CaptureSummary | null>;

  abstract countByStatus(): Promise<{ total: number; ok: number }>;

  /** Successful counts in chronological order, optionally since a point in time. */
  abstract rawSeries(since: Date | null): Promise<SeriesPoint[]>;

  /** Average successful count per calendar bucket. */
  abstract bucketedSeries(interval: SeriesInterval, since: Date): Promise<SeriesPoint[]>;
}
