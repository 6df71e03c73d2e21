import { Module } from '@nestjs/common';
import { ConfigModule } from '../libs/common';
import { CapturesModule } from './captures/captures.module';
import { HealthModule } from './health/health.module';
import { MetricsModule } from './metrics/metrics.module';
import { OverviewModule } from './overview/overview.module';

@Module({
  imports: [ConfigModule, CapturesModule, MetricsModule, OverviewModule, HealthModule],
})
export class AppModule { }
