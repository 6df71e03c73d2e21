import { Injectable, Logger } from '@nestjs/common';
import { errors } from '@elastic/elasticsearch';
import type { estypes } from '@elastic/elasticsearch';
import { ElasticService, IMAGE_FIELDS } from '../elastic';
import { CaptureRepository } from './capture.repository';
import type {
  CapturePage,
  CaptureRecord,
  CaptureStatus,
  CaptureSummary,
  NewCaptureRecord,
  SeriesInterval,
  SeriesPoint,
  StoredImage,
} from './capture-record.types';

/** Document shape in the captures index. */
export interface CaptureDocument {
  captured_at: string;
  created_at: string;
  camera_id: number;
  people_count: number | null;
  confidence_threshold: number;
  model_identifier: string;
  image_width: number | null;
  image_height: number | null;
  raw_image: string | null;
  raw_image_mime_type: string | null;
  annotated_image: string | null;
  annotated_image_mime_type: string | null;
  status: CaptureStatus;
  error_message: string | null;
}

type CaptureSummaryDocument = Omit<CaptureDocument, 'raw_image' | 'annotated_image'>;

const PRUNE_SCRIPT = [
  'ctx._source.raw_image = null',
  'ctx._source.raw_image_mime_type = null',
  'ctx._source.annotated_image = null',
  'ctx._source.annotated_image_mime_type = null',
].join('; ');

const SERIES_PAGE_SIZE = 5000;

export function toDocument(record: NewCaptureRecord, createdAt: Date): CaptureDocument {
  return {
    captured_at: record.captured_at.toISOString(),
    created_at: createdAt.toISOString(),
    camera_id: record.camera_id,
    people_count: record.people_count,
    confidence_threshold: record.confidence_threshold,
    model_identifier: record.model_identifier,
    image_width: record.image_width,
    image_height: record.image_height,
    raw_image: record.raw_image ? record.raw_image.data.toString('base64') : null,
    raw_image_mime_type: record.raw_image ? record.raw_image.mime_type : null,
    annotated_image: record.annotated_image ? record.annotated_image.data.toString('base64') : null,
    annotated_image_mime_type: record.annotated_image ? record.annotated_image.mime_type : null,
    status: record.status,
    error_message: record.error_message,
  };
}

function toImage(data: string | null, mimeType: string | null, fallbackMime: string): StoredImage | null {
  if (data === null) return null;
  return { data: Buffer.from(data, 'base64'), mime_type: mimeType ?? fallbackMime };
}

export function fromDocument(id: string, doc: CaptureDocument): CaptureRecord {
  const base = {
    id,
    captured_at: new Date(doc.captured_at),
    created_at: new Date(doc.created_at),
    camera_id: doc.camera_id,
    confidence_threshold: doc.confidence_threshold,
    model_identifier: doc.model_identifier,
  };
  if (doc.status === 'ok' && doc.people_count !== null) {
    return {
      ...base,
      status: 'ok',
      people_count: doc.people_count,
      image_width: doc.image_width,
      image_height: doc.image_height,
      raw_image: toImage(doc.raw_image, doc.raw_image_mime_type, 'image/jpeg'),
      annotated_image: toImage(doc.annotated_image, doc.annotated_image_mime_type, 'image/png'),
      error_message: null,
    };
  }
  return {
    ...base,
    status: 'error',
    people_count: null,
    image_width: null,
    image_height: null,
    raw_image: null,
    annotated_image: null,
    error_message: doc.error_message ?? 'unknown error',
  };
}

function summaryFromDocument(id: string, doc: CaptureSummaryDocument): CaptureSummary {
  return {
    id,
    captured_at: new Date(doc.captured_at),
    created_at: new Date(doc.created_at),
    camera_id: doc.camera_id,
    people_count: doc.people_count,
    confidence_threshold: doc.confidence_threshold,
    model_identifier: doc.model_identifier,
    image_width: doc.image_width,
    image_height: doc.image_height,
    status: doc.status,
    error_message: doc.error_message,
    has_image: doc.raw_image_mime_type !== null && doc.raw_image_mime_type !== undefined,
    has_annotated_image: doc.annotated_image_mime_type !== null && doc.annotated_image_mime_type !== undefined,
  };
}

function successfulSince(since: Date | null): estypes.QueryDslQueryContainer {
  const filter: estypes.QueryDslQueryContainer[] = [
    { term: { status: 'ok' } },
    { exists: { field: 'people_count' } },
  ];
  if (since !== null) {
    filter.push({ range: { captured_at: { gte: since.toISOString() } } });
  }
  return { bool: { filter } };
}

function averageOf(bucket: estypes.AggregationsDateHistogramBucket): number | null {
  const aggregate = bucket.avg_count;
  if (typeof aggregate !== 'object' || aggregate === null || !('value' in aggregate)) return null;
  return typeof aggregate.value === 'number' ? aggregate.value : null;
}

@Injectable()
export class ElasticCaptureRepository extends CaptureRepository {
  private readonly logger = new Logger(ElasticCaptureRepository.name);

  constructor(private readonly elasticService: ElasticService) {
    super();
  }

  async insert(record: NewCaptureRecord): Promise<CaptureRecord> {
    const createdAt = new Date();
    const response = await this.elasticService.getClient().index<CaptureDocument>({
      index: this.elasticService.getIndexName(),
      document: toDocument(record, createdAt),
      refresh: 'wait_for',
    });
    this.logger.debug(`Capture indexed - ID: ${response._id}, status: ${record.status}`);
    return { ...record, id: response._id, created_at: createdAt };
  }

  async pruneImages(cutoff: Date): Promise<number> {
    const response = await this.elasticService.getClient().updateByQuery({
      index: this.elasticService.getIndexName(),
      refresh: true,
      query: {
        bool: {
          filter: [{ range: { captured_at: { lt: cutoff.toISOString() } } }],
          should: [
            { exists: { field: 'raw_image_mime_type' } },
            { exists: { field: 'annotated_image_mime_type' } },
          ],
          minimum_should_match: 1,
        },
      },
      script: { lang: 'painless', source: PRUNE_SCRIPT },
    });
    return response.updated ?? 0;
  }

  async findById(id: string): Promise<CaptureRecord | null> {
    try {
      const response = await this.elasticService.getClient().get<CaptureDocument>({
        index: this.elasticService.getIndexName(),
        id,
      });
      return response._source ? fromDocument(response._id, response._source) : null;
    } catch (error) {
      if (error instanceof errors.ResponseError && error.statusCode === 404) return null;
      throw error;
    }
  }

  async list(page: number, pageSize: number): Promise<CapturePage> {
    const response = await this.elasticService.getClient().search<CaptureSummaryDocument>({
      index: this.elasticService.getIndexName(),
      from: (page - 1) * pageSize,
      size: pageSize,
      sort: [{ captured_at: { order: 'desc' } }],
      _source_excludes: IMAGE_FIELDS,
      track_total_hits: true,
    });
    const { total } = response.hits;
    return {
      total: typeof total === 'number' ? total : total?.value ?? 0,
      items: response.hits.hits.flatMap((hit) =>
        hit._id && hit._source ? [summaryFromDocument(hit._id, hit._source)] : [],
      ),
    };
  }

  async latest(): Promise<CaptureSummary | null> {
    const { items } = await this.list(1, 1);
    return items.length > 0 ? items[0] : null;
  }

  async countByStatus(): Promise<{ total: number; ok: number }> {
    const client = this.elasticService.getClient();
    const index = this.elasticService.getIndexName();
    const [all, ok] = await Promise.all([
      client.count({ index }),
      client.count({ index, query: { term: { status: 'ok' } } }),
    ]);
    return { total: all.count, ok: ok.count };
  }

  async rawSeries(since: Date | null): Promise<SeriesPoint[]> {
    const client = this.elasticService.getClient();
    const points: SeriesPoint[] = [];
    let searchAfter: estypes.SortResults | undefined;

    for (;;) {
      const response = await client.search<Pick<CaptureDocument, 'captured_at' | 'people_count'>>({
        index: this.elasticService.getIndexName(),
        size: SERIES_PAGE_SIZE,
        query: successfulSince(since),
        sort: [{ captured_at: { order: 'asc' } }, { created_at: { order: 'asc' } }],
        _source: ['captured_at', 'people_count'],
        search_after: searchAfter,
      });
      const { hits } = response.hits;
      for (const hit of hits) {
        if (hit._source && hit._source.people_count !== null) {
          points.push({
            timestamp: new Date(hit._source.captured_at).toISOString(),
            value: hit._source.people_count,
          });
        }
      }
      if (hits.length < SERIES_PAGE_SIZE) break;
      searchAfter = hits[hits.length - 1].sort;
    }
    return points;
  }

  async bucketedSeries(interval: SeriesInterval, since: Date): Promise<SeriesPoint[]> {
    const response = await this.elasticService
      .getClient()
      .search<unknown, { per_bucket: estypes.AggregationsDateHistogramAggregate }>({
        index: this.elasticService.getIndexName(),
        size: 0,
        query: successfulSince(since),
        aggs: {
          per_bucket: {
            date_histogram: { field: 'captured_at', calendar_interval: interval, min_doc_count: 1 },
            aggs: { avg_count: { avg: { field: 'people_count' } } },
          },
        },
      });
    const buckets = response.aggregations?.per_bucket.buckets ?? [];
    const ordered = Array.isArray(buckets) ? buckets : Object.values(buckets);
    return ordered.flatMap((bucket) => {
      const value = averageOf(bucket);
      return value === null ? [] : [{ timestamp: new Date(bucket.key).toISOString(), value }];
    });
  }
}
