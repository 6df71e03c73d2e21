import { ConfigService } from '@nestjs/config';
import { Command, CommandRunner, Option } from 'nest-commander';
import * as path from 'path';
import { CameraModuleError, FrameCapturerService, describeError } from '../../libs/common';
import { parseIntegerOption, parseNumberOption } from './number-options';

export interface CaptureFrameOptions {
  output: string;
  timeout?: number;
  cameraId?: number;
}

/** Saves one JPEG frame of the livestream. Exit code 2 on camera failures, 1 on anything else. */
@Command({ name: 'capture-frame', description: 'Capture one JPEG frame from the livestream' })
export class CaptureFrameCommand extends CommandRunner {
  constructor(
    private readonly configService: ConfigService,
    private readonly frameCapturer: FrameCapturerService,
  ) {
    super();
  }

  async run(_params: string[], options: CaptureFrameOptions): Promise<void> {
    const outputPath = path.resolve(options.output);
    const timeoutSeconds = options.timeout ?? 30;
    const cameraId = options.cameraId ?? this.configService.get<number>('camera.id', 461);

    try {
      const result = await this.frameCapturer.captureTo(outputPath, {
        cameraId,
        timeoutMs: Math.round(timeoutSeconds * 1000),
      });
      const dimensions = result.width && result.height ? `${result.width}x${result.height}` : 'unknown';
      process.stdout.write(`Saved JPEG: ${result.outputPath} (${dimensions})\n`);
    } catch (error) {
      if (error instanceof CameraModuleError) {
        process.stderr.write(`Camera capture error: ${describeError(error)}\n`);
        process.exitCode = 2;
        return;
      }
      process.stderr.write(`Unexpected error: ${describeError(error)}\n`);
      process.exitCode = 1;
    }
  }

  @Option({ flags: '-o, --output <path>', description: 'Path of the JPEG to write', required: true })
  parseOutput(value: string): string {
    return value;
  }

  @Option({ flags: '--timeout <seconds>', description: 'Capture timeout in seconds (default: 30)' })
  parseTimeout(value: string): number {
    return parseNumberOption('--timeout', value);
  }

  @Option({ flags: '--camera-id <id>', description: 'Camera id (default: CAMERA_ID)' })
  parseCameraId(value: string): number {
    return parseIntegerOption('--camera-id', value);
  }
}
