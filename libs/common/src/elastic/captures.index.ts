/**
 * queue-captures index definition.
 * One document per capture cycle. Image payloads are base64 `binary` fields,
 * which are not searchable, so their mime type siblings mark presence.
 */

export const CAPTURES_INDEX_MAPPING = {
  properties: {
    captured_at: { type: 'date' as const },
    created_at: { type: 'date' as const },
    camera_id: { type: 'integer' as const },
    people_count: { type: 'integer' as const },
    confidence_threshold: { type: 'float' as const },
    model_identifier: { type: 'keyword' as const },
    image_width: { type: 'integer' as const },
    image_height: { type: 'integer' as const },
    raw_image: { type: 'binary' as const },
    raw_image_mime_type: { type: 'keyword' as const },
    annotated_image: { type: 'binary' as const },
    annotated_image_mime_type: { type: 'keyword' as const },
    status: { type: 'keyword' as const },
    error_message: { type: 'text' as const },
  },
};

export const CAPTURES_INDEX_SETTINGS = {
  number_of_shards: 1,
  number_of_replicas: 0,
};

export const IMAGE_FIELDS = ['raw_image', 'annotated_image'];

/** Elasticsearch's default `index.max_result_window`: `from + size` may not exceed it. */
export const MAX_RESULT_WINDOW = 10000;
