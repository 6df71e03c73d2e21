import { DEFAULT_ROI_POLYGON, parseRoiPolygon } from '../roi/roi.constants';

function envInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`Invalid integer for ${name}: ${raw}`);
  }
  return value;
}

function envPositiveInt(name: string, fallback: number): number {
  const value = envInt(name, fallback);
  if (value <= 0) {
    throw new Error(`Invalid ${name}: expected a positive integer, got ${value}`);
  }
  return value;
}

function envFloat(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid float for ${name}: ${raw}`);
  }
  return value;
}

export default () => ({
  port: envInt('PORT', 3000),
  nodeEnv: process.env.NODE_ENV ?? 'development',
  apiPrefix: process.env.API_PREFIX ?? 'api',
  cors: {
    origin: process.env.CORS_ORIGIN
      ? process.env.CORS_ORIGIN.split(',').map((o) => o.trim()).filter(Boolean)
      : ['http://localhost:3000', 'http://localhost:5173'],
    credentials: process.env.CORS_CREDENTIALS === 'true',
  },
  logging: {
    level: process.env.LOG_LEVEL ?? 'info',
  },
  camera: {
    id: envInt('CAMERA_ID', 461),
    pageUrl: process.env.CAMERA_PAGE_URL ?? 'https://balticlivecam.com/ru/cameras/estonia/narva/narva/',
    authEndpoint: process.env.CAMERA_AUTH_ENDPOINT ?? 'https://balticlivecam.com/wp-admin/admin-ajax.php',
    userAgent:
      process.env.CAMERA_USER_AGENT ??
      'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
    discoveryTimeoutMs: envInt('CAMERA_DISCOVERY_TIMEOUT_MS', 15000),
  },
  capture: {
    ffmpegBin: process.env.FFMPEG_BIN ?? 'ffmpeg',
    ffprobeBin: process.env.FFPROBE_BIN ?? 'ffprobe',
    timeoutMs: envInt('CAPTURE_TIMEOUT_MS', 30000),
    jpegQuality: envInt('CAPTURE_JPEG_QUALITY', 2),
    dimensionsTimeoutMs: envInt('CAPTURE_DIMENSIONS_TIMEOUT_MS', 10000),
  },
  detection: {
    endpoint: process.env.DETECTION_ENDPOINT ?? 'http://localhost:8081/predict',
    model: process.env.DETECTION_MODEL ?? 'yolov8n.pt',
    confidence: envFloat('DETECTION_CONFIDENCE', 0.25),
    timeoutMs: envInt('DETECTION_TIMEOUT_MS', 60000),
  },
  roi: {
    baseWidth: envPositiveInt('ROI_BASE_WIDTH', 1920),
    baseHeight: envPositiveInt('ROI_BASE_HEIGHT', 1080),
    polygon: process.env.ROI_POLYGON ? parseRoiPolygon(process.env.ROI_POLYGON) : DEFAULT_ROI_POLYGON,
  },
  worker: {
    captureIntervalSeconds: envInt('CAPTURE_INTERVAL_SECONDS', 60),
    retentionIntervalHours: envInt('RETENTION_INTERVAL_HOURS', 24),
  },
  retention: {
    imageTtlDays: envInt('IMAGE_TTL_DAYS', 30),
  },
  dashboard: {
    defaultPageSize: envInt('DEFAULT_PAGE_SIZE', 50),
    maxSeriesPoints: envInt('MAX_SERIES_POINTS', 1000),
  },
  elasticsearch: {
    node: process.env.ELASTICSEARCH_NODE ?? 'http://localhost:9200',
    username: process.env.ELASTICSEARCH_USERNAME ?? 'elastic',
    password: process.env.ELASTICSEARCH_PASSWORD ?? 'changeme',
    index: process.env.ELASTICSEARCH_INDEX ?? 'queue-captures',
    requestTimeout: envInt('ELASTICSEARCH_REQUEST_TIMEOUT', 30000),
  },
  kafka: {
    enabled: process.env.KAFKA_ENABLED === 'true',
    broker: process.env.KAFKA_BROKER ?? 'localhost:9092',
    clientId: process.env.KAFKA_CLIENT_ID ?? 'queue-watch-worker',
    connectionTimeout: envInt('KAFKA_CONNECTION_TIMEOUT', 3000),
    requestTimeout: envInt('KAFKA_REQUEST_TIMEOUT', 30000),
    retry: {
      retries: envInt('KAFKA_RETRIES', 5),
      initialRetryTime: envInt('KAFKA_INITIAL_RETRY_TIME', 100),
      multiplier: envFloat('KAFKA_RETRY_MULTIPLIER', 2),
    },
    topics: {
      queueCounts: process.env.KAFKA_TOPIC_QUEUE_COUNTS ?? 'queue-watch.queue-counts.v1',
    },
  },
});
