import { Inject, Injectable, Logger } from '@nestjs/common';
import { TtlCache } from '../cache/ttl-cache';
import { CacheStats } from '../cache/cache.interface';
import { IpmaHttpService } from './ipma-http.service';
import { IPMA_SETTINGS, IpmaSettings } from './ipma-settings';
import {
  DailyForecast,
  LocalitiesResponse,
  Locality,
  WeatherTypeLabel,
  WeatherTypeLabels,
  WeatherTypesResponse,
} from './ipma.types';
import { LocalityResolution, resolveLocality } from './locality-resolution';

const LOCALITIES_KEY = 'localities';
const WEATHER_TYPES_KEY = 'weather_types';

export interface IpmaCacheStats {
  localities: CacheStats & { ttlSeconds: number };
  weatherTypes: CacheStats & { ttlSeconds: number };
  forecasts: CacheStats & { ttlSeconds: number };
}

/**
 * Read-through client for IPMA open data.
 *
 * Owns one cache per resource class. Concurrent misses on the same key are
 * not coalesced: each caller fetches and the last `set` wins.
 */
@Injectable()
export class IpmaClientService {
  private readonly logger = new Logger(IpmaClientService.name);
  private readonly localitiesCache: TtlCache<Locality[]>;
  private readonly weatherTypesCache: TtlCache<WeatherTypeLabels>;
  private readonly forecastCache: TtlCache<DailyForecast>;

  constructor(
    @Inject(IPMA_SETTINGS)
    private readonly settings: IpmaSettings,
    private readonly http: IpmaHttpService,
  ) {
    this.localitiesCache = new TtlCache({
      name: 'localities',
      ttlSeconds: settings.localitiesTtl,
    });
    this.weatherTypesCache = new TtlCache({
      name: 'weather-types',
      ttlSeconds: settings.classesTtl,
    });
    this.forecastCache = new TtlCache({
      name: 'forecasts',
      ttlSeconds: settings.forecastTtl,
    });
  }

  /**
   * All reference localities, as IPMA returns them
   */
  async getLocalities(): Promise<Locality[]> {
    const cached = this.localitiesCache.get(LOCALITIES_KEY);
    if (cached !== undefined) {
      return cached;
    }

    const url = `${this.settings.baseUrl}/distrits-islands.json`;
    const body = await this.http.getJson<LocalitiesResponse>(url);
    const items = body.data ?? [];

    this.localitiesCache.set(LOCALITIES_KEY, items);
    this.logger.debug(`Loaded ${items.length} localities from IPMA`);
    return items;
  }

  /**
   * Weather type code -> PT/EN labels
   */
  async getWeatherTypes(): Promise<WeatherTypeLabels> {
    const cached = this.weatherTypesCache.get(WEATHER_TYPES_KEY);
    if (cached !== undefined) {
      return cached;
    }

    const url = `${this.settings.baseUrl}/weather-type-classe.json`;
    const body = await this.http.getJson<WeatherTypesResponse>(url);

    const labels = new Map<number, WeatherTypeLabel>();
    for (const item of body.data ?? []) {
      labels.set(Number(item.idWeatherType), {
        pt: item.descWeatherTypePT ?? '',
        en: item.descWeatherTypeEN ?? '',
      });
    }

    this.weatherTypesCache.set(WEATHER_TYPES_KEY, labels);
    this.logger.debug(`Loaded ${labels.size} weather types from IPMA`);
    return labels;
  }

  /**
   * Multi-day forecast for a locality, as IPMA returns it
   */
  async getDailyForecast(globalIdLocal: number): Promise<DailyForecast> {
    const cacheKey = `forecast:${globalIdLocal}`;
    const cached = this.forecastCache.get(cacheKey);
    if (cached !== undefined) {
      return cached;
    }

    const url = `${this.settings.baseUrl}/forecast/meteorology/cities/daily/${globalIdLocal}.json`;
    const forecast = await this.http.getJson<DailyForecast>(url);

    this.forecastCache.set(cacheKey, forecast);
    return forecast;
  }

  /**
   * Resolve a human-entered locality name, optionally within one district
   */
  async findLocality(
    name: string,
    districtId?: number,
  ): Promise<LocalityResolution<Locality>> {
    const localities = await this.getLocalities();
    const result = resolveLocality(localities, name, districtId);

    if (result.status === 'found') {
      this.logger.debug(
        `Resolved "${name}" to ${result.locality.globalIdLocal} (${result.tier} match)`,
      );
    } else {
      this.logger.debug(`No locality matches "${name}"`);
    }
    return result;
  }

  clearCaches(): void {
    this.localitiesCache.clear();
    this.weatherTypesCache.clear();
    this.forecastCache.clear();
    this.logger.log('Cleared IPMA caches');
  }

  getCacheStats(): IpmaCacheStats {
    return {
      localities: {
        ...this.localitiesCache.getStats(),
        ttlSeconds: this.localitiesCache.ttlSeconds,
      },
      weatherTypes: {
        ...this.weatherTypesCache.getStats(),
        ttlSeconds: this.weatherTypesCache.ttlSeconds,
      },
      forecasts: {
        ...this.forecastCache.getStats(),
        ttlSeconds: this.forecastCache.ttlSeconds,
      },
    };
  }
}
