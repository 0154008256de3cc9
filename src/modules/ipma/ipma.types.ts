/**
 * Reference data for a locality (district capitals, islands and a few extras).
 * `latitude` and `longitude` come from IPMA as decimal-degree strings.
 */
export interface Locality {
  globalIdLocal: number;
  local: string;
  idRegiao: number;
  idDistrito: number;
  idConcelho: number;
  idAreaAviso: string;
  latitude: string;
  longitude: string;
}

export interface LocalitiesResponse {
  data?: Locality[];
}

export interface WeatherTypeItem {
  idWeatherType: number | string;
  descWeatherTypePT?: string;
  descWeatherTypeEN?: string;
}

export interface WeatherTypesResponse {
  data?: WeatherTypeItem[];
}

export interface WeatherTypeLabel {
  pt: string;
  en: string;
}

export type WeatherTypeLabels = ReadonlyMap<number, WeatherTypeLabel>;

/**
 * Numeric fields arrive as numbers or strings depending on the endpoint
 */
export type NumericValue = number | string;

export interface DayForecast {
  forecastDate: string; // YYYY-MM-DD
  tMin: NumericValue;
  tMax: NumericValue;
  precipitaProb: NumericValue;
  predWindDir: string | null;
  idWeatherType: number | string;
  classWindSpeed: number | string | null;
  classPrecInt?: number | string | null;
  latitude?: NumericValue | null;
  longitude?: NumericValue | null;
}

export interface DailyForecast {
  owner: string;
  country: string;
  globalIdLocal: number;
  dataUpdate: string;
  data: DayForecast[];
}
