import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CaptureRepository, SeriesPoint, downsamplePoints } from '../../libs/common';
import { SeriesRange } from './dto/series.query.dto';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export interface SeriesResponse {
  range: SeriesRange;
  points: SeriesPoint[];
}

@Injectable()
export class MetricsService {
  constructor(
    private readonly configService: ConfigService,
    private readonly captureRepository: CaptureRepository,
  ) {}

  /**
   * People-count time series for the dashboard plots.
   * hour: per-minute averages, day: raw points, month: hourly averages,
   * all: raw points downsampled to the configured maximum.
   */
  async series(range: SeriesRange, now: Date = new Date()): Promise<SeriesResponse> {
    const ago = (ms: number) => new Date(now.getTime() - ms);

    switch (range) {
      case 'hour':
        return { range, points: await this.captureRepository.bucketedSeries('minute', ago(HOUR_MS)) };
      case 'day':
        return { range, points: await this.captureRepository.rawSeries(ago(DAY_MS)) };
      case 'month':
        return { range, points: await this.captureRepository.bucketedSeries('hour', ago(30 * DAY_MS)) };
      case 'all': {
        const maxPoints = this.configService.get<number>('dashboard.maxSeriesPoints', 1000);
        return { range, points: downsamplePoints(await this.captureRepository.rawSeries(null), maxPoints) };
      }
    }
  }
}
