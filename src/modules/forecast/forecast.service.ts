import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { IpmaClientService } from '../ipma/ipma-client.service';
import { DailyForecast } from '../ipma/ipma.types';
import {
  DayForecastView,
  buildDayForecast,
  normalizeForecast,
} from './forecast-normalizer';

export interface ForecastTarget {
  globalIdLocal?: number;
  locality?: string;
  districtId?: number;
}

@Injectable()
export class ForecastService {
  private readonly logger = new Logger(ForecastService.name);

  constructor(private readonly ipmaClient: IpmaClientService) {}

  /**
   * Use the given globalIdLocal, or resolve one from the locality name
   */
  async resolveGlobalId(target: ForecastTarget): Promise<number> {
    if (target.globalIdLocal !== undefined) {
      return target.globalIdLocal;
    }
    if (!target.locality?.trim()) {
      throw new BadRequestException(
        'Provide either global_id_local or locality',
      );
    }

    const resolution = await this.ipmaClient.findLocality(
      target.locality,
      target.districtId,
    );
    if (resolution.status === 'not_found') {
      this.logger.debug(
        `Locality not found: "${resolution.query}" (district ${resolution.districtId ?? 'any'})`,
      );
      throw new NotFoundException('Locality not found');
    }
    return Number(resolution.locality.globalIdLocal);
  }

  /**
   * Multi-day forecast with numeric fields coerced to numbers
   */
  async getDailyForecast(target: ForecastTarget): Promise<DailyForecast> {
    const globalIdLocal = await this.resolveGlobalId(target);
    const forecast = await this.ipmaClient.getDailyForecast(globalIdLocal);
    return normalizeForecast(forecast);
  }

  /**
   * One day of the forecast, with weather type labels and wind grouped
   */
  async getDayForecast(
    target: ForecastTarget,
    forecastDate: string,
  ): Promise<DayForecastView> {
    const globalIdLocal = await this.resolveGlobalId(target);
    const forecast = await this.ipmaClient.getDailyForecast(globalIdLocal);
    const weatherTypes = await this.ipmaClient.getWeatherTypes();

    const result = buildDayForecast(forecast, forecastDate, weatherTypes);
    if (result.status === 'date_unavailable') {
      this.logger.debug(
        `No forecast for ${forecastDate} at ${globalIdLocal}; available: ${result.available.join(', ')}`,
      );
      throw new NotFoundException('Date not in available forecast window');
    }
    return result.day;
  }
}
