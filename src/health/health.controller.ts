import { Controller, Get } from '@nestjs/common';
import { ElasticService } from '../../libs/common';

/**
 * Production health check endpoint.
 * Use for load balancers, Kubernetes liveness/readiness, and monitoring.
 */
@Controller('health')
export class HealthController {
  constructor(private readonly elasticService: ElasticService) {}

  @Get()
  async check() {
    const elasticsearch = await this.elasticService.checkConnection();
    return {
      status: elasticsearch ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      service: 'queue-watch',
      elasticsearch: elasticsearch ? 'up' : 'down',
    };
  }
}
