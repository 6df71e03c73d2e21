export { CameraModule } from './camera.module';
export { runAttempts } from './attempts';
export type { AttemptOutcome } from './attempts';
export {
  CameraModuleError,
  CaptureError,
  CaptureTimeoutError,
  DependencyMissingError,
  DiscoveryError,
  describeError,
} from './camera.errors';
export { FrameCapturerService, CAPTURE_ATTEMPTS } from './frame-capturer.service';
export type { CaptureOptions, CaptureResult } from './frame-capturer.service';
export { ProcessRunnerService, isMissingBinaryError } from './process-runner.service';
export type { ProcessResult } from './process-runner.service';
export { REDACTED_TOKEN, redactTokens } from './redact';
export { StreamLocatorService, DISCOVERY_ATTEMPTS, extractStreamUrl } from './stream-locator.service';
