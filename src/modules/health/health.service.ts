import { Inject, Injectable } from '@nestjs/common';
import { IPMA_SETTINGS, IpmaSettings } from '../ipma/ipma-settings';

export interface HealthStatus {
  status: 'ok';
  upstream: string;
  cacheTtlSeconds: {
    localities: number;
    weatherTypes: number;
    forecasts: number;
  };
  timestamp: string;
}

@Injectable()
export class HealthService {
  constructor(
    @Inject(IPMA_SETTINGS)
    private readonly settings: IpmaSettings,
  ) {}

  /**
   * Liveness payload plus the upstream and cache settings in effect
   */
  getStatus(): HealthStatus {
    return {
      status: 'ok',
      upstream: this.settings.baseUrl,
      cacheTtlSeconds: {
        localities: this.settings.localitiesTtl,
        weatherTypes: this.settings.classesTtl,
        forecasts: this.settings.forecastTtl,
      },
      timestamp: new Date().toISOString(),
    };
  }
}
