import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { CaptureRepository } from '../../libs/common';
import { failedCapture, successfulCapture } from '../../libs/common/src/captures/testing/capture-fixtures';
import { InMemoryCaptureRepository } from '../../libs/common/src/captures/testing/in-memory-capture.repository';
import { SeriesQueryDto } from './dto/series.query.dto';
import { MetricsService } from './metrics.service';

const now = new Date('2026-01-01T12:00:00.000Z');

describe('MetricsService', () => {
  let service: MetricsService;

  beforeEach(async () => {
    const repository = new InMemoryCaptureRepository();
    await repository.insert(successfulCapture(new Date('2025-11-01T00:00:00.000Z'), 5));
    await repository.insert(successfulCapture(new Date('2025-12-31T13:00:00.000Z'), 1));
    await repository.insert(successfulCapture(new Date('2026-01-01T10:00:00.000Z'), 9));
    await repository.insert(successfulCapture(new Date('2026-01-01T11:30:10.000Z'), 2));
    await repository.insert(successfulCapture(new Date('2026-01-01T11:30:50.000Z'), 4));
    await repository.insert(successfulCapture(new Date('2026-01-01T11:45:00.000Z'), 6));
    await repository.insert(failedCapture(new Date('2026-01-01T11:50:00.000Z')));

    const moduleRef = await Test.createTestingModule({
      providers: [
        MetricsService,
        { provide: CaptureRepository, useValue: repository },
        { provide: ConfigService, useValue: new ConfigService({ dashboard: { maxSeriesPoints: 3 } }) },
      ],
    }).compile();
    service = moduleRef.get(MetricsService);
  });

  it('averages per minute over the last hour', async () => {
    await expect(service.series('hour', now)).resolves.toEqual({
      range: 'hour',
      points: [
        { timestamp: '2026-01-01T11:30:00.000Z', value: 3 },
        { timestamp: '2026-01-01T11:45:00.000Z', value: 6 },
      ],
    });
  });

  it('returns raw points over the last day', async () => {
    const { points } = await service.series('day', now);
    expect(points.map((point) => point.value)).toEqual([1, 9, 2, 4, 6]);
  });

  it('averages per hour over the last month', async () => {
    await expect(service.series('month', now)).resolves.toEqual({
      range: 'month',
      points: [
        { timestamp: '2025-12-31T13:00:00.000Z', value: 1 },
        { timestamp: '2026-01-01T10:00:00.000Z', value: 9 },
        { timestamp: '2026-01-01T11:00:00.000Z', value: 4 },
      ],
    });
  });

  it('downsamples the full history', async () => {
    const { points } = await service.series('all', now);
    expect(points).toEqual([
      { timestamp: '2025-11-01T00:00:00.000Z', value: 5 },
      { timestamp: '2026-01-01T11:30:10.000Z', value: 2 },
      { timestamp: '2026-01-01T11:45:00.000Z', value: 6 },
    ]);
  });
});

describe('SeriesQueryDto', () => {
  it('accepts the known ranges', async () => {
    await expect(validate(plainToInstance(SeriesQueryDto, { range: 'month' }))).resolves.toHaveLength(0);
  });

  it('rejects anything else', async () => {
    const errors = await validate(plainToInstance(SeriesQueryDto, { range: 'week' }));
    expect(errors[0].constraints).toEqual({ isIn: 'range must be one of: hour, day, month, all' });
  });
});
