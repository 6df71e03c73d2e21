import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, rm, stat } from 'fs/promises';
import * as path from 'path';
import { runAttempts } from './attempts';
import {
  CaptureError,
  CaptureTimeoutError,
  DependencyMissingError,
  DiscoveryError,
  describeError,
} from './camera.errors';
import { ProcessResult, ProcessRunnerService, isMissingBinaryError } from './process-runner.service';
import { redactTokens } from './redact';
import { StreamLocatorService } from './stream-locator.service';

export const CAPTURE_ATTEMPTS = 2;

export interface CaptureResult {
  outputPath: string;
  width: number | null;
  height: number | null;
  /** Host serving the stream; the tokenized URL itself is not kept. */
  streamHost: string;
  capturedAt: Date;
  sourcePageUrl: string;
}

export interface CaptureOptions {
  cameraId?: number;
  timeoutMs?: number;
  /** ffmpeg `-q:v` value, 2 (best) to 31. */
  jpegQuality?: number;
}

const DIMENSIONS_PATTERN = /^(\d+)x(\d+)$/;

@Injectable()
export class FrameCapturerService {
  private readonly logger = new Logger(FrameCapturerService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly streamLocator: StreamLocatorService,
    private readonly processRunner: ProcessRunnerService,
  ) {}

  /**
   * Pull exactly one JPEG frame from the camera's livestream into `outputPath`.
   * Discovery and capture are retried together; the output file never survives
   * a failed attempt.
   */
  async captureTo(outputPath: string, options: CaptureOptions = {}): Promise<CaptureResult> {
    const cameraId = options.cameraId ?? this.configService.get<number>('camera.id', 461);
    const timeoutMs = options.timeoutMs ?? this.configService.get<number>('capture.timeoutMs', 30000);
    const jpegQuality = options.jpegQuality ?? this.configService.get<number>('capture.jpegQuality', 2);
    const pageUrl = this.configService.get<string>('camera.pageUrl', '');
    const ffmpegName = this.configService.get<string>('capture.ffmpegBin', 'ffmpeg');

    const ffmpegBin = await this.processRunner.resolveBinary(ffmpegName);
    if (ffmpegBin === null) {
      throw new DependencyMissingError(`Required binary not found in PATH: ${ffmpegName}`);
    }

    const target = path.resolve(outputPath);
    await mkdir(path.dirname(target), { recursive: true });

    const outcome = await runAttempts(
      CAPTURE_ATTEMPTS,
      async () => {
        const streamUrl = await this.streamLocator.locate(cameraId, pageUrl, timeoutMs);
        await this.extractFrame(ffmpegBin, streamUrl, target, timeoutMs, jpegQuality);
        const { width, height } = await this.readDimensions(target);
        return {
          outputPath: target,
          width,
          height,
          streamHost: new URL(streamUrl).host,
          capturedAt: new Date(),
          sourcePageUrl: pageUrl,
        };
      },
      (error) => error instanceof DiscoveryError || error instanceof CaptureError,
      async (error, attempt) => {
        this.logger.warn(
          `Capture attempt ${attempt}/${CAPTURE_ATTEMPTS} failed: ${redactTokens(describeError(error))}`,
        );
        await rm(target, { force: true });
      },
    );
    if (outcome.ok) return outcome.value;

    throw new CaptureError(
      `Failed to capture frame from live stream. Last error: ${redactTokens(describeError(outcome.lastError))}`,
      { cause: outcome.lastError },
    );
  }

  private async extractFrame(
    ffmpegBin: string,
    streamUrl: string,
    target: string,
    timeoutMs: number,
    jpegQuality: number,
  ): Promise<void> {
    const args = [
      '-hide_banner',
      '-loglevel',
      'error',
      '-i',
      streamUrl,
      '-frames:v',
      '1',
      '-q:v',
      String(jpegQuality),
      target,
    ];

    let result: ProcessResult;
    try {
      result = await this.processRunner.run(ffmpegBin, args, timeoutMs);
    } catch (error) {
      if (isMissingBinaryError(error)) {
        throw new DependencyMissingError(`Required binary not found in PATH: ${ffmpegBin}`, { cause: error });
      }
      throw new CaptureError(`ffmpeg could not be started: ${redactTokens(describeError(error))}`, {
        cause: error,
      });
    }

    if (result.timedOut) {
      throw new CaptureTimeoutError('ffmpeg timed out while capturing frame.');
    }
    if (result.exitCode !== 0) {
      throw new CaptureError(`ffmpeg failed: ${redactTokens(result.stderr).trim()}`);
    }

    const size = await stat(target).then(
      (info) => info.size,
      () => 0,
    );
    if (size === 0) {
      throw new CaptureError('ffmpeg completed but output JPEG was not created.');
    }
  }

  /** Best effort: any ffprobe problem leaves the dimensions unknown. */
  async readDimensions(imagePath: string): Promise<{ width: number | null; height: number | null }> {
    const unknownSize = { width: null, height: null };
    const ffprobeName = this.configService.get<string>('capture.ffprobeBin', 'ffprobe');
    const timeoutMs = this.configService.get<number>('capture.dimensionsTimeoutMs', 10000);

    const ffprobeBin = await this.processRunner.resolveBinary(ffprobeName);
    if (ffprobeBin === null) {
      this.logger.debug(`${ffprobeName} not found, frame dimensions unknown`);
      return unknownSize;
    }

    try {
      const result = await this.processRunner.run(
        ffprobeBin,
        ['-v', 'error', '-select_streams', 'v:0', '-show_entries', 'stream=width,height', '-of', 'csv=p=0:s=x', imagePath],
        timeoutMs,
      );
      const match = result.exitCode === 0 ? DIMENSIONS_PATTERN.exec(result.stdout.trim()) : null;
      if (!match) return unknownSize;
      return { width: Number(match[1]), height: Number(match[2]) };
    } catch (error) {
      this.logger.debug(`ffprobe failed: ${describeError(error)}`);
      return unknownSize;
    }
  }
}
