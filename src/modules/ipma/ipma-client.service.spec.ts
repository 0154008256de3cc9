import { Test } from '@nestjs/testing';
import { IpmaClientService } from './ipma-client.service';
import { IpmaHttpService } from './ipma-http.service';
import { IPMA_SETTINGS } from './ipma-settings';
import { UpstreamStatusError } from './ipma.errors';
import {
  LOCALITIES,
  LOCALITIES_URL,
  TEST_SETTINGS,
  WEATHER_TYPES_URL,
  fakeUpstream,
  forecastUrl,
} from '../../test/ipma-fixtures';

describe('IpmaClientService', () => {
  let service: IpmaClientService;
  let upstream: ReturnType<typeof fakeUpstream>;
  let nowSpy: jest.SpyInstance<number, []>;

  const createService = async (
    fake: ReturnType<typeof fakeUpstream>,
  ): Promise<IpmaClientService> => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        IpmaClientService,
        { provide: IPMA_SETTINGS, useValue: TEST_SETTINGS },
        { provide: IpmaHttpService, useValue: fake },
      ],
    }).compile();

    return moduleRef.get(IpmaClientService);
  };

  beforeEach(async () => {
    upstream = fakeUpstream();
    nowSpy = jest.spyOn(Date, 'now').mockReturnValue(0);
    service = await createService(upstream);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const advanceSeconds = (seconds: number) => {
    nowSpy.mockReturnValue(Date.now() + seconds * 1000);
  };

  describe('getLocalities', () => {
    it('fetches once and serves repeats from cache', async () => {
      const first = await service.getLocalities();
      const second = await service.getLocalities();

      expect(first).toEqual(LOCALITIES);
      expect(second).toBe(first);
      expect(upstream.getJson).toHaveBeenCalledTimes(1);
      expect(upstream.getJson).toHaveBeenCalledWith(LOCALITIES_URL);
    });

    it('refetches after the localities TTL', async () => {
      await service.getLocalities();
      advanceSeconds(TEST_SETTINGS.localitiesTtl);
      await service.getLocalities();
      expect(upstream.getJson).toHaveBeenCalledTimes(1);

      advanceSeconds(1);
      await service.getLocalities();
      expect(upstream.getJson).toHaveBeenCalledTimes(2);
    });

    it('caches an empty list when the payload has no data', async () => {
      upstream = fakeUpstream({ [LOCALITIES_URL]: { owner: 'IPMA' } });
      service = await createService(upstream);

      await expect(service.getLocalities()).resolves.toEqual([]);
      await expect(service.getLocalities()).resolves.toEqual([]);
      expect(upstream.getJson).toHaveBeenCalledTimes(1);
    });

    it('does not coalesce concurrent misses', async () => {
      await Promise.all([service.getLocalities(), service.getLocalities()]);
      expect(upstream.getJson).toHaveBeenCalledTimes(2);
    });
  });

  describe('getWeatherTypes', () => {
    it('builds an integer-keyed label map', async () => {
      const labels = await service.getWeatherTypes();

      expect(labels.get(1)).toEqual({ pt: 'Céu limpo', en: 'Clear sky' });
      expect(labels.get(2)).toEqual({
        pt: 'Céu pouco nublado',
        en: 'Partly cloudy',
      });
      expect(labels.get(6)).toEqual({ pt: '', en: '' });
      expect(labels.size).toBe(3);
    });

    it('caches the transformed map', async () => {
      const first = await service.getWeatherTypes();
      const second = await service.getWeatherTypes();

      expect(second).toBe(first);
      expect(upstream.getJson).toHaveBeenCalledTimes(1);
      expect(upstream.getJson).toHaveBeenCalledWith(WEATHER_TYPES_URL);
    });
  });

  describe('getDailyForecast', () => {
    it('caches per locality', async () => {
      await service.getDailyForecast(1131200);
      await service.getDailyForecast(1131200);
      await service.getDailyForecast(1110600);

      expect(upstream.getJson).toHaveBeenCalledTimes(2);
      expect(upstream.getJson).toHaveBeenNthCalledWith(1, forecastUrl(1131200));
      expect(upstream.getJson).toHaveBeenNthCalledWith(2, forecastUrl(1110600));
    });

    it('expires forecasts before the reference data', async () => {
      await service.getLocalities();
      await service.getDailyForecast(1131200);

      advanceSeconds(TEST_SETTINGS.forecastTtl + 1);
      await service.getLocalities();
      await service.getDailyForecast(1131200);

      const urls = upstream.getJson.mock.calls.map(([url]) => url);
      expect(urls).toEqual([
        LOCALITIES_URL,
        forecastUrl(1131200),
        forecastUrl(1131200),
      ]);
    });

    it('returns the upstream document unchanged', async () => {
      const forecast = await service.getDailyForecast(1131200);
      expect(forecast.data[0].tMin).toBe('12.5');
    });
  });

  describe('upstream failures', () => {
    it('propagates the error and caches nothing', async () => {
      const failure = new UpstreamStatusError(LOCALITIES_URL, 503);
      upstream.getJson.mockRejectedValueOnce(failure);

      await expect(service.getLocalities()).rejects.toBe(failure);
      await expect(service.getLocalities()).resolves.toEqual(LOCALITIES);
      expect(upstream.getJson).toHaveBeenCalledTimes(2);
    });

    it('does not fall back to an expired entry', async () => {
      await service.getDailyForecast(1131200);
      advanceSeconds(TEST_SETTINGS.forecastTtl + 1);

      const failure = new UpstreamStatusError(forecastUrl(1131200), 500);
      upstream.getJson.mockRejectedValueOnce(failure);

      await expect(service.getDailyForecast(1131200)).rejects.toBe(failure);
    });
  });

  describe('findLocality', () => {
    it('resolves through the cached localities', async () => {
      const porto = await service.findLocality('porto');
      const lisboa = await service.findLocality('Lisboa');

      expect(porto).toEqual({
        status: 'found',
        tier: 'exact',
        locality: LOCALITIES[0],
      });
      expect(lisboa.status === 'found' && lisboa.locality.globalIdLocal).toBe(
        1110600,
      );
      expect(upstream.getJson).toHaveBeenCalledTimes(1);
    });

    it('restricts candidates to the district', async () => {
      const result = await service.findLocality('porto', 32);
      expect(result).toEqual({
        status: 'found',
        tier: 'partial',
        locality: LOCALITIES[1],
      });
    });

    it('returns not_found instead of throwing', async () => {
      await expect(service.findLocality('zzzznotreal')).resolves.toEqual({
        status: 'not_found',
        query: 'zzzznotreal',
      });
    });
  });

  describe('cache administration', () => {
    it('reports per-cache statistics', async () => {
      await service.getLocalities();
      await service.getLocalities();

      const stats = service.getCacheStats();
      expect(stats.localities).toEqual({
        hits: 1,
        misses: 1,
        evictions: 0,
        entries: 1,
        hitRate: 0.5,
        ttlSeconds: TEST_SETTINGS.localitiesTtl,
      });
      expect(stats.forecasts.ttlSeconds).toBe(TEST_SETTINGS.forecastTtl);
    });

    it('refetches everything after clearCaches', async () => {
      await service.getLocalities();
      service.clearCaches();
      await service.getLocalities();

      expect(upstream.getJson).toHaveBeenCalledTimes(2);
    });
  });
});
