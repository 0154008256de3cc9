import {
  DailyForecast,
  DayForecast,
  NumericValue,
  WeatherTypeLabels,
} from '../ipma/ipma.types';

const NUMERIC_DAY_FIELDS = [
  'tMin',
  'tMax',
  'precipitaProb',
  'latitude',
  'longitude',
] as const;

// Decimal floats only; hex, binary and octal literals stay strings
const DECIMAL_FLOAT = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export interface DayForecastView {
  globalIdLocal: number;
  forecastDate: string;
  tMin: NumericValue;
  tMax: NumericValue;
  precipitaProb: NumericValue;
  predWindDir: string | null;
  weather: {
    id: number | null;
    pt: string;
    en: string;
  };
  wind: {
    class: number | null;
    dir: string | null;
  };
}

export type DayForecastResult =
  | { status: 'found'; day: DayForecastView }
  | { status: 'date_unavailable'; forecastDate: string; available: string[] };

/**
 * Coerce a value to a number when it parses as one; otherwise return it as is
 */
export function coerceNumber<T>(value: T): T | number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  return DECIMAL_FLOAT.test(trimmed) ? Number(trimmed) : value;
}

function toInteger(value: unknown): number | null {
  if (value === null || value === undefined || value === '') {
    return null;
  }
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : null;
}

function normalizeDay(day: DayForecast): DayForecast {
  const normalized: DayForecast = { ...day };
  for (const field of NUMERIC_DAY_FIELDS) {
    const value = normalized[field];
    if (value !== undefined && value !== null) {
      normalized[field] = coerceNumber(value);
    }
  }
  return normalized;
}

/**
 * Copy of the forecast with numeric day fields coerced to numbers.
 * The input document is left untouched since it may be a cached value.
 */
export function normalizeForecast(forecast: DailyForecast): DailyForecast {
  return {
    ...forecast,
    data: (forecast.data ?? []).map(normalizeDay),
  };
}

/**
 * Pick one day out of a forecast and expand its weather type and wind class
 */
export function buildDayForecast(
  forecast: DailyForecast,
  forecastDate: string,
  weatherTypes: WeatherTypeLabels,
): DayForecastResult {
  const normalized = normalizeForecast(forecast);
  const day = normalized.data.find((d) => d.forecastDate === forecastDate);

  if (!day) {
    return {
      status: 'date_unavailable',
      forecastDate,
      available: normalized.data.map((d) => d.forecastDate),
    };
  }

  const weatherId = toInteger(day.idWeatherType);
  const label = weatherId === null ? undefined : weatherTypes.get(weatherId);

  return {
    status: 'found',
    day: {
      globalIdLocal: Number(normalized.globalIdLocal),
      forecastDate,
      tMin: day.tMin,
      tMax: day.tMax,
      precipitaProb: day.precipitaProb,
      predWindDir: day.predWindDir ?? null,
      weather: {
        id: weatherId,
        pt: label?.pt ?? '',
        en: label?.en ?? '',
      },
      wind: {
        class: toInteger(day.classWindSpeed),
        dir: day.predWindDir ?? null,
      },
    },
  };
}
