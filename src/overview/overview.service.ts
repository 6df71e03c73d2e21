import { Injectable } from '@nestjs/common';
import { CaptureRepository, CaptureSummary } from '../../libs/common';

export interface OverviewSummary {
  latest: CaptureSummary | null;
  total_captures: number;
  ok_captures: number;
}

@Injectable()
export class OverviewService {
  constructor(private readonly captureRepository: CaptureRepository) {}

  async getSummary(): Promise<OverviewSummary> {
    const [latest, counts] = await Promise.all([
      this.captureRepository.latest(),
      this.captureRepository.countByStatus(),
    ]);
    return { latest, total_captures: counts.total, ok_captures: counts.ok };
  }
}
