import { ConfigService } from '@nestjs/config';
import { existsSync } from 'fs';
import { writeFile } from 'fs/promises';
import * as path from 'path';
import {
  AnnotationService,
  CaptureError,
  CaptureResult,
  DetectionModelError,
  FrameCapturerService,
  PersonDetectorService,
  ProcessRunnerService,
  StreamLocatorService,
} from '../../libs/common';
import { InMemoryCaptureRepository } from '../../libs/common/src/captures/testing/in-memory-capture.repository';
import { FakeDetectionModel } from '../../libs/common/src/detection/testing/fake-detection.model';
import { IngestionService } from './ingestion.service';

const capturedAt = new Date('2026-04-10T09:30:00.000Z');

describe('IngestionService', () => {
  let frameCapturer: FrameCapturerService;
  let model: FakeDetectionModel;
  let annotationService: AnnotationService;
  let repository: InMemoryCaptureRepository;
  let service: IngestionService;

  beforeEach(() => {
    const config = new ConfigService({
      camera: { id: 461 },
      detection: { confidence: 0.25 },
      roi: {
        baseWidth: 100,
        baseHeight: 100,
        polygon: [
          [10, 10],
          [90, 10],
          [90, 90],
          [10, 90],
        ],
      },
    });
    frameCapturer = new FrameCapturerService(config, new StreamLocatorService(config), new ProcessRunnerService());
    model = new FakeDetectionModel();
    annotationService = new AnnotationService();
    repository = new InMemoryCaptureRepository();
    service = new IngestionService(
      config,
      frameCapturer,
      new PersonDetectorService(model, config),
      annotationService,
      repository,
    );

    jest.spyOn(annotationService, 'renderPng').mockResolvedValue(Buffer.from('png-bytes'));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function captureSucceeds() {
    return jest.spyOn(frameCapturer, 'captureTo').mockImplementation(async (outputPath): Promise<CaptureResult> => {
      await writeFile(outputPath, 'jpeg-bytes');
      return {
        outputPath,
        width: 100,
        height: 100,
        streamHost: 'edge.example.net',
        capturedAt,
        sourcePageUrl: 'https://cams.example.com/border/',
      };
    });
  }

  function framePathOf(spy: jest.SpyInstance): string {
    const [framePath] = spy.mock.calls[0];
    if (typeof framePath !== 'string') throw new Error('captureTo was not called with a path');
    return framePath;
  }

  it('stores a successful capture with both images', async () => {
    const captureTo = captureSucceeds();
    model.result = {
      frameShape: null,
      detections: [
        { classId: 0, box: [20, 20, 40, 40] },
        { classId: 0, box: [1, 1, 5, 5] },
      ],
    };

    const record = await service.runCycle();

    expect(record).toMatchObject({
      id: '1',
      status: 'ok',
      captured_at: capturedAt,
      camera_id: 461,
      people_count: 1,
      confidence_threshold: 0.25,
      model_identifier: 'fake-model',
      image_width: 100,
      image_height: 100,
      error_message: null,
    });
    expect(record.raw_image).toEqual({ data: Buffer.from('jpeg-bytes'), mime_type: 'image/jpeg' });
    expect(record.annotated_image).toEqual({ data: Buffer.from('png-bytes'), mime_type: 'image/png' });
    expect(repository.records).toHaveLength(1);

    const framePath = framePathOf(captureTo);
    expect(annotationService.renderPng).toHaveBeenCalledWith(
      framePath,
      [[20, 20, 40, 40]],
      [
        [10, 10],
        [90, 10],
        [90, 90],
        [10, 90],
      ],
    );
    expect(existsSync(path.dirname(framePath))).toBe(false);
  });

  it('stores an error record when the capture fails', async () => {
    const captureTo = jest
      .spyOn(frameCapturer, 'captureTo')
      .mockRejectedValue(new CaptureError('Failed to capture frame from live stream. Last error: ffmpeg failed: 404'));

    const record = await service.runCycle();

    expect(record).toMatchObject({
      status: 'error',
      people_count: null,
      raw_image: null,
      annotated_image: null,
      error_message: 'Failed to capture frame from live stream. Last error: ffmpeg failed: 404',
    });
    expect(repository.records).toHaveLength(1);
    expect(model.predict).not.toHaveBeenCalled();
    expect(existsSync(path.dirname(framePathOf(captureTo)))).toBe(false);
  });

  it('stores an error record when detection fails', async () => {
    captureSucceeds();
    model.predict.mockRejectedValueOnce(new DetectionModelError('Detection service returned HTTP 500'));

    await expect(service.runCycle()).resolves.toMatchObject({
      status: 'error',
      error_message: 'Detection service returned HTTP 500',
    });
  });

  it('propagates storage failures after cleaning up', async () => {
    const captureTo = captureSucceeds();
    model.result = { frameShape: null, detections: [] };
    jest.spyOn(repository, 'insert').mockRejectedValue(new Error('index unavailable'));

    await expect(service.runCycle()).rejects.toThrow('index unavailable');
    expect(existsSync(path.dirname(framePathOf(captureTo)))).toBe(false);
  });
});
