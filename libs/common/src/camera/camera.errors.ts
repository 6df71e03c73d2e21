/** Base class for failures while locating or capturing the livestream. */
export class CameraModuleError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The tokenized stream URL could not be discovered. Transient. */
export class DiscoveryError extends CameraModuleError {}

/** ffmpeg failed to produce a frame. Transient. */
export class CaptureError extends CameraModuleError {}

export class CaptureTimeoutError extends CaptureError {}

/** A required binary is not on PATH. Never retried. */
export class DependencyMissingError extends CameraModuleError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
