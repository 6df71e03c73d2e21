import { ConfigService } from '@nestjs/config';
import { Command, CommandRunner, Option } from 'nest-commander';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import {
  AnnotationService,
  CameraModuleError,
  FrameCapturerService,
  PersonDetectorService,
  describeError,
} from '../../libs/common';
import { parseIntegerOption, parseNumberOption } from './number-options';

export interface CountPeopleOptions {
  cameraId?: number;
  timeout?: number;
  conf?: number;
  annotatedPng?: string;
}

export interface CountReport {
  timestamp_utc: string;
  camera_id: number;
  model: string;
  confidence_threshold: number;
  people_count: number | null;
  image_width: number | null;
  image_height: number | null;
  annotated_png_path: string | null;
  status: 'ok' | 'error';
  error: string | null;
}

/**
 * Captures one frame into a temporary directory, counts the people inside the
 * ROI and prints a single JSON report, on failure too. Nothing is stored.
 */
@Command({ name: 'count-people', description: 'Capture one frame and print the ROI people count as JSON' })
export class CountPeopleCommand extends CommandRunner {
  constructor(
    private readonly configService: ConfigService,
    private readonly frameCapturer: FrameCapturerService,
    private readonly personDetector: PersonDetectorService,
    private readonly annotationService: AnnotationService,
  ) {
    super();
  }

  async run(_params: string[], options: CountPeopleOptions = {}): Promise<void> {
    const cameraId = options.cameraId ?? this.configService.get<number>('camera.id', 461);
    const confidence = options.conf ?? this.configService.get<number>('detection.confidence', 0.25);
    const timeoutMs = Math.round((options.timeout ?? 30) * 1000);
    const base = {
      camera_id: cameraId,
      model: this.personDetector.modelIdentifier,
      confidence_threshold: confidence,
    };

    const workDir = await mkdtemp(path.join(tmpdir(), 'queue-count-'));
    try {
      const framePath = path.join(workDir, 'frame.jpg');
      const capture = await this.frameCapturer.captureTo(framePath, { cameraId, timeoutMs });
      const detection = await this.personDetector.count(framePath, confidence, capture.width, capture.height);
      const width = detection.width ?? capture.width;
      const height = detection.height ?? capture.height;

      let annotatedPath: string | null = null;
      if (options.annotatedPng) {
        const roi = this.personDetector.roiFor(width, height);
        annotatedPath = path.resolve(options.annotatedPng);
        await mkdir(path.dirname(annotatedPath), { recursive: true });
        await writeFile(annotatedPath, await this.annotationService.renderPng(framePath, detection.boxes, roi));
      }

      this.print({
        timestamp_utc: new Date().toISOString(),
        ...base,
        people_count: detection.count,
        image_width: width,
        image_height: height,
        annotated_png_path: annotatedPath,
        status: 'ok',
        error: null,
      });
    } catch (error) {
      if (!(error instanceof CameraModuleError)) {
        }
      this.print({
        timestamp_utc: new Date().toISOString(),
        ...base,
        people_count: null,
        image_width: null,
        image_height: null,
        annotated_png_path: null,
        status: 'error',
        error: describeError(error),
      });
      process.exitCode = error instanceof CameraModuleError ? 2 : 1;
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  private print(report: CountReport) {
    process.stdout.write(`${JSON.stringify(report)}\n`);
  }

  @Option({ flags: '--camera-id <id>', description: 'Camera id (default: CAMERA_ID)' })
  parseCameraId(value: string): number {
    return parseIntegerOption('--camera-id', value);
  }

  @Option({ flags: '--timeout <seconds>', description: 'Capture timeout in seconds (default: 30)' })
  parseTimeout(value: string): number {
    return parseNumberOption('--timeout', value);
  }

  @Option({ flags: '--conf <threshold>', description: 'Detection confidence threshold (default: DETECTION_CONFIDENCE)' })
  parseConf(value: string): number {
    return parseNumberOption('--conf', value);
  }

  @Option({ flags: '--annotated-png <path>', description: 'Also write the annotated frame as PNG' })
  parseAnnotatedPng(value: string): string {
    return value;
  }
}
