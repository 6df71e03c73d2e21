import { Controller, Get, Query } from '@nestjs/common';
import { SeriesQueryDto } from './dto/series.query.dto';
import { MetricsService } from './metrics.service';

@Controller('metrics')
export class MetricsController {
  constructor(private readonly metricsService: MetricsService) {}

  @Get('series')
  async series(@Query() query: SeriesQueryDto) {
    return this.metricsService.series(query.range ?? 'hour');
  }
}
