import { Module } from '@nestjs/common';
import { CapturesModule } from '../../libs/common';
import { MetricsController } from './metrics.controller';
import { MetricsService } from './metrics.service';

@Module({
  imports: [CapturesModule],
  controllers: [MetricsController],
  providers: [MetricsService],
})
export class MetricsModule {}
