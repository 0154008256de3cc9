import { ConfigService } from '@nestjs/config';

export const IPMA_SETTINGS = Symbol('IPMA_SETTINGS');

export interface IpmaSettings {
  readonly baseUrl: string;
  // TTLs in seconds
  readonly localitiesTtl: number;
  readonly classesTtl: number;
  readonly forecastTtl: number;
}

export const DEFAULT_IPMA_SETTINGS: IpmaSettings = {
  baseUrl: 'https://api.ipma.pt/open-data',
  localitiesTtl: 12 * 60 * 60, // localities change rarely
  classesTtl: 12 * 60 * 60,
  forecastTtl: 30 * 60,
};

function readSeconds(
  configService: ConfigService,
  key: string,
  fallback: number,
): number {
  const raw = configService.get<string | number>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const parsed = typeof raw === 'number' ? raw : parseInt(raw, 10);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
}

/**
 * Read the IPMA settings once; the result is frozen for the process lifetime
 */
export function loadIpmaSettings(configService: ConfigService): IpmaSettings {
  const baseUrl = configService.get<string>(
    'IPMA_BASE_URL',
    DEFAULT_IPMA_SETTINGS.baseUrl,
  );

  return Object.freeze({
    baseUrl: baseUrl.replace(/\/+$/, ''),
    localitiesTtl: readSeconds(
      configService,
      'CACHE_TTL_LOCALITIES',
      DEFAULT_IPMA_SETTINGS.localitiesTtl,
    ),
    classesTtl: readSeconds(
      configService,
      'CACHE_TTL_CLASSES',
      DEFAULT_IPMA_SETTINGS.classesTtl,
    ),
    forecastTtl: readSeconds(
      configService,
      'CACHE_TTL_FORECAST',
      DEFAULT_IPMA_SETTINGS.forecastTtl,
    ),
  });
}
