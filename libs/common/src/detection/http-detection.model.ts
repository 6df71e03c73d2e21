import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { readFile } from 'fs/promises';
import * as path from 'path';
import { Detection, DetectionModel, DetectionModelError, DetectionResult, SizeHint } from './detection-model';
import { PredictionResponseDto } from './prediction-response.dto';

/**
 * Detection model served over HTTP by an inference server (YOLO-style
 * `predict` endpoint). The image is uploaded as multipart form data.
 */
@Injectable()
export class HttpDetectionModel implements DetectionModel {
  private readonly logger = new Logger(HttpDetectionModel.name);
  readonly identifier: string;

  constructor(private readonly configService: ConfigService) {
    this.identifier = this.configService.get<string>('detection.model', 'yolov8n.pt');
  }

  async predict(imagePath: string, confidence: number, sizeHint?: SizeHint): Promise<DetectionResult | null> {
    const endpoint = this.configService.get<string>('detection.endpoint', 'http://localhost:8081/predict');
    const timeoutMs = this.configService.get<number>('detection.timeoutMs', 60000);

    const image = await readFile(imagePath);
    const form = new FormData();
    form.append('image', new Blob([image], { type: 'image/jpeg' }), path.basename(imagePath));
    form.append('model', this.identifier);
    form.append('conf', String(confidence));
    if (sizeHint) {
      form.append('imgsz', `${sizeHint.height},${sizeHint.width}`);
      form.append('rect', String(sizeHint.rectangular));
    }

    const ac = new AbortController();
    const t = setTimeout(() => ac.abort(), timeoutMs);
    let payload: unknown;
    try {
      const res = await fetch(endpoint, { method: 'POST', body: form, signal: ac.signal });
      if (!res.ok) {
        throw new DetectionModelError(`Detection service returned HTTP ${res.status}`);
      }
      payload = await res.json();
    } catch (err) {
      if (err instanceof DetectionModelError) throw err;
      const reason = ac.signal.aborted ? `timed out after ${timeoutMs}ms` : err instanceof Error ? err.message : String(err);
      throw new DetectionModelError(`Detection request failed: ${reason}`, { cause: err });
    } finally {
      clearTimeout(t);
    }

    return this.toDetectionResult(payload);
  }

  private async toDetectionResult(payload: unknown): Promise<DetectionResult | null> {
    if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
      throw new DetectionModelError('Invalid detection response: expected a JSON object');
    }
    const response = plainToInstance(PredictionResponseDto, payload);
    const errors = await validate(response);
    if (errors.length > 0) {
      const details = errors.map((error) => error.toString(false, true)).join('; ');
      throw new DetectionModelError(`Invalid detection response: ${details.trim()}`);
    }

    if (response.results.length === 0) return null;
    const [first] = response.results;
    this.logger.debug(`Model returned ${first.boxes.length} boxes`);

    return {
      frameShape: first.orig_shape ? { height: first.orig_shape[0], width: first.orig_shape[1] } : null,
      detections: first.boxes.map((box): Detection => ({
        classId: box.cls,
        box: [box.xyxy[0], box.xyxy[1], box.xyxy[2], box.xyxy[3]],
        confidence: box.conf,
      })),
    };
  }
}
