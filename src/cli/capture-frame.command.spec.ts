import { ConfigService } from '@nestjs/config';
import * as path from 'path';
import {
  CaptureResult,
  DiscoveryError,
  FrameCapturerService,
  ProcessRunnerService,
  StreamLocatorService,
} from '../../libs/common';
import { CaptureFrameCommand } from './capture-frame.command';

function captureResult(outputPath: string, width: number | null, height: number | null): CaptureResult {
  return {
    outputPath,
    width,
    height,
    streamHost: 'edge.example.net',
    capturedAt: new Date('2026-04-10T09:30:00.000Z'),
    sourcePageUrl: 'https://cams.example.com/border/',
  };
}

describe('CaptureFrameCommand', () => {
  let frameCapturer: FrameCapturerService;
  let command: CaptureFrameCommand;
  let stdout: jest.SpyInstance;
  let stderr: jest.SpyInstance;

  beforeEach(() => {
    const config = new ConfigService({ camera: { id: 461 } });
    frameCapturer = new FrameCapturerService(config, new StreamLocatorService(config), new ProcessRunnerService());
    command = new CaptureFrameCommand(config, frameCapturer);
    stdout = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    stderr = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('saves the frame at the resolved output path', async () => {
    const target = path.resolve('frames/one.jpg');
    const captureTo = jest.spyOn(frameCapturer, 'captureTo').mockResolvedValue(captureResult(target, 1280, 720));

    await command.run([], { output: 'frames/one.jpg' });

    expect(captureTo).toHaveBeenCalledWith(target, { cameraId: 461, timeoutMs: 30000 });
    expect(stdout).toHaveBeenCalledWith(`Saved JPEG: ${target} (1280x720)\n`);
    expect(process.exitCode).toBeUndefined();
  });

  it('passes camera id and timeout through', async () => {
    const captureTo = jest
      .spyOn(frameCapturer, 'captureTo')
      .mockResolvedValue(captureResult('/tmp/one.jpg', null, null));

    await command.run([], { output: '/tmp/one.jpg', cameraId: 12, timeout: 2.5 });

    expect(captureTo).toHaveBeenCalledWith('/tmp/one.jpg', { cameraId: 12, timeoutMs: 2500 });
    expect(stdout).toHaveBeenCalledWith('Saved JPEG: /tmp/one.jpg (unknown)\n');
  });

  it('exits with 2 on camera failures', async () => {
    jest.spyOn(frameCapturer, 'captureTo').mockRejectedValue(new DiscoveryError('auth_token request failed: HTTP 403'));

    await command.run([], { output: '/tmp/one.jpg' });

    expect(stderr).toHaveBeenCalledWith('Camera capture error: auth_token request failed: HTTP 403\n');
    expect(stdout).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(2);
  });

  it('exits with 1 on anything else', async () => {
    jest.spyOn(frameCapturer, 'captureTo').mockRejectedValue(new Error('disk full'));

    await command.run([], { output: '/tmp/one.jpg' });

    expect(stderr).toHaveBeenCalledWith('Unexpected error: disk full\n');
    expect(process.exitCode).toBe(1);
  });
});
