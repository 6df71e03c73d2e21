import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import {
  AnnotationService,
  CaptureRecord,
  CaptureRepository,
  FrameCapturerService,
  NewCaptureRecord,
  PersonDetectorService,
  describeError,
} from '../../libs/common';

export type CycleState = 'CAPTURING' | 'DETECTING' | 'PERSISTING' | 'DONE';

interface CycleSettings {
  cameraId: number;
  confidence: number;
  modelIdentifier: string;
}

/**
 * Runs one capture cycle: capture → detect → persist. Every cycle persists
 * exactly one record, a failed capture or detection becoming an error record.
 */
@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly frameCapturer: FrameCapturerService,
    private readonly personDetector: PersonDetectorService,
    private readonly annotationService: AnnotationService,
    private readonly captureRepository: CaptureRepository,
  ) {}

  async runCycle(): Promise<CaptureRecord> {
    const settings: CycleSettings = {
      cameraId: this.configService.get<number>('camera.id', 461),
      confidence: this.configService.get<number>('detection.confidence', 0.25),
      modelIdentifier: this.personDetector.modelIdentifier,
    };

    const workDir = await mkdtemp(path.join(tmpdir(), 'queue-capture-'));
    try {
      const record = await this.buildRecord(path.join(workDir, 'frame.jpg'), settings);
      this.enter('PERSISTING');
      const stored = await this.captureRepository.insert(record);
      this.enter('DONE');
      return stored;
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  private async buildRecord(framePath: string, settings: CycleSettings): Promise<NewCaptureRecord> {
    try {
      this.enter('CAPTURING');
      const capture = await this.frameCapturer.captureTo(framePath, { cameraId: settings.cameraId });

      this.enter('DETECTING');
      const detection = await this.personDetector.count(
        framePath,
        settings.confidence,
        capture.width,
        capture.height,
      );
      const width = detection.width ?? capture.width;
      const height = detection.height ?? capture.height;
      const roi = this.personDetector.roiFor(width, height);
      const annotated = await this.annotationService.renderPng(framePath, detection.boxes, roi);

      return {
        status: 'ok',
        captured_at: capture.capturedAt,
        camera_id: settings.cameraId,
        people_count: detection.count,
        confidence_threshold: settings.confidence,
        model_identifier: settings.modelIdentifier,
        image_width: width,
        image_height: height,
        raw_image: { data: await readFile(framePath), mime_type: 'image/jpeg' },
        annotated_image: { data: annotated, mime_type: 'image/png' },
        error_message: null,
      };
    } catch (error) {
      this.logger.warn(`Capture cycle failed before persisting: ${describeError(error)}`);
      return {
        status: 'error',
        captured_at: new Date(),
        camera_id: settings.cameraId,
        people_count: null,
        confidence_threshold: settings.confidence,
        model_identifier: settings.modelIdentifier,
        image_width: null,
        image_height: null,
        raw_image: null,
        annotated_image: null,
        error_message: describeError(error),
      };
    }
  }

  private enter(state: CycleState) {
    this.logger.verbose(`Cycle state: ${state}`);
  }
}
