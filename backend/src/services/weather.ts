/**
 * Weather API Service
 * OpenWeatherMap API를 사용하여 현재 날씨 제공
 */

import axios from 'axios';
import createDebug from 'debug';
import { env } from '../config/env.js';
import { ExternalProviderError, describeError } from '../errors.js';
import type { WeatherProvider, WeatherReport } from '../types/index.js';

const debug = createDebug('voicedesk:weather');

const OPENWEATHER_URL = 'https://api.openweathermap.org/data/2.5/weather';

interface OpenWeatherResponse {
  name: string;
  sys: { country: string };
  weather: Array<{ description: string }>;
  main: { temp: number; feels_like: number; humidity: number };
  wind: { speed: number };
}

// "light rain" → "Light Rain"
function titleCase(text: string): string {
  return text.replace(/\b\w/g, c => c.toUpperCase());
}

export class OpenWeatherProvider implements WeatherProvider {
  constructor(
    private readonly apiKey: string,
    private readonly timeoutMs: number = 10_000
  ) {}

  get configured(): boolean {
    return this.apiKey !== '';
  }

  async getCurrentWeather(location: string): Promise<WeatherReport> {
    if (!this.configured) {
      throw new ExternalProviderError(
        'OpenWeatherMap',
        'OPENWEATHER_API_KEY not set',
        `Sorry, I couldn't get the weather for ${location} right now. Please try again later.`
      );
    }

    debug('Fetching weather for %s', location);

    let data: OpenWeatherResponse;
    try {
      const response = await axios.get<OpenWeatherResponse>(OPENWEATHER_URL, {
        params: { q: location, appid: this.apiKey, units: 'imperial' },
        timeout: this.timeoutMs,
      });
      data = response.data;
    } catch (error) {
      console.error('[Weather] API request failed:', describeError(error));
      throw new ExternalProviderError(
        'OpenWeatherMap',
        `Failed to fetch weather data: ${describeError(error)}`,
        `Sorry, I couldn't get the weather for ${location} right now. Please try again later.`,
        { cause: error }
      );
    }

    const condition = data.weather?.[0]?.description;
    if (!data.main || !data.sys || !data.wind || !condition) {
      throw new ExternalProviderError(
        'OpenWeatherMap',
        'Unexpected weather API response format',
        'I received an unexpected response from the weather service. Please try again.'
      );
    }

    return {
      location: `${data.name}, ${data.sys.country}`,
      temperature: `${Math.round(data.main.temp)}°F`,
      feelsLike: `${Math.round(data.main.feels_like)}°F`,
      condition: titleCase(condition),
      humidity: `${data.main.humidity}%`,
      windSpeed: `${data.wind.speed} mph`,
    };
  }
}

export function createWeatherProvider(): WeatherProvider {
  if (!env.OPENWEATHER_API_KEY) {
    console.warn('[Weather] OPENWEATHER_API_KEY not set, using demo data');
  }
  return new OpenWeatherProvider(env.OPENWEATHER_API_KEY);
}
