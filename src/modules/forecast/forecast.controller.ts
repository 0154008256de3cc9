import { Controller, Get, Query } from '@nestjs/common';
import { ForecastService, ForecastTarget } from './forecast.service';
import { DayForecastQueryDto, ForecastQueryDto } from './forecast.dto';
import { DailyForecast } from '../ipma/ipma.types';
import { DayForecastView } from './forecast-normalizer';

function toTarget(query: ForecastQueryDto): ForecastTarget {
  return {
    globalIdLocal: query.global_id_local,
    locality: query.locality,
    districtId: query.district_id,
  };
}

@Controller('v1/forecast')
export class ForecastController {
  constructor(private readonly forecastService: ForecastService) {}

  /**
   * Multi-day forecast (typically five days): /v1/forecast/daily
   */
  @Get('daily')
  async getDaily(@Query() query: ForecastQueryDto): Promise<DailyForecast> {
    return this.forecastService.getDailyForecast(toTarget(query));
  }

  /**
   * Single normalized day: /v1/forecast/day?forecast_date=YYYY-MM-DD
   */
  @Get('day')
  async getDay(@Query() query: DayForecastQueryDto): Promise<DayForecastView> {
    return this.forecastService.getDayForecast(
      toTarget(query),
      query.forecast_date,
    );
  }
}
