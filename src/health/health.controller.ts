import {
  Controller,
  Get,
  ServiceUnavailableException,
} from '@nestjs/common';
import { API_PREFIX } from '../common/routes';
import { HealthService, type MetricsReport, type StatusReport } from './health.service';

@Controller()
export class HealthController {
  constructor(private readonly health: HealthService) {}

  @Get()
  root() {
    return { message: 'Travel Advisor API is running!', status: 'healthy' };
  }

  @Get('health')
  async check() {
    if (!(await this.health.databaseReachable())) {
      throw new ServiceUnavailableException('Service unavailable');
    }
    return {
      status: 'healthy',
      database: 'connected',
      shutdown_requested: this.health.shutdownRequested,
    };
  }

  @Get('ready')
  async ready() {
    if (!(await this.health.databaseReachable())) {
      throw new ServiceUnavailableException('Service not ready');
    }
    return { status: 'ready' };
  }

  @Get(['status', `${API_PREFIX}/status`])
  status(): StatusReport {
    return this.health.status();
  }

  @Get('metrics')
  metrics(): MetricsReport {
    return this.health.metrics();
  }
}
