import { Controller, Delete, Get, HttpCode } from '@nestjs/common';
import { HealthService, HealthStatus } from './health.service';
import {
  IpmaCacheStats,
  IpmaClientService,
} from '../ipma/ipma-client.service';

@Controller('health')
export class HealthController {
  constructor(
    private readonly healthService: HealthService,
    private readonly ipmaClient: IpmaClientService,
  ) {}

  /**
   * Liveness probe
   */
  @Get()
  getStatus(): HealthStatus {
    return this.healthService.getStatus();
  }

  @Get('cache')
  getCacheStats(): IpmaCacheStats {
    return this.ipmaClient.getCacheStats();
  }

  /**
   * Drop every cached IPMA document; the next request refetches
   */
  @Delete('cache')
  @HttpCode(204)
  clearCache(): void {
    this.ipmaClient.clearCaches();
  }
}
