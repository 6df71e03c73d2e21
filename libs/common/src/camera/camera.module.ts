import { Module } from '@nestjs/common';
import { FrameCapturerService } from './frame-capturer.service';
import { ProcessRunnerService } from './process-runner.service';
import { StreamLocatorService } from './stream-locator.service';

@Module({
  providers: [ProcessRunnerService, StreamLocatorService, FrameCapturerService],
  exports: [ProcessRunnerService, StreamLocatorService, FrameCapturerService],
})
export class CameraModule {}
