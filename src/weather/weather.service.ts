import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GeocodingService } from './geocoding.service';
import { describeWeatherCode } from './weather-codes';
import type { Coordinates, WeatherLookup } from './weather.types';

const MAX_ATTEMPTS = 3;

interface CurrentWeather {
  temperature: number;
  weathercode: number;
}

function readCurrentWeather(body: unknown): CurrentWeather | null {
  if (typeof body !== 'object' || body === null) return null;
  const current: unknown = Reflect.get(body, 'current_weather');
  if (typeof current !== 'object' || current === null) return null;

  const temperature: unknown = Reflect.get(current, 'temperature');
  const weathercode: unknown = Reflect.get(current, 'weathercode');
  if (typeof temperature !== 'number' || typeof weathercode !== 'number') {
    return null;
  }
  return { temperature, weathercode };
}

/**
 * Current conditions for a destination name. Never throws: every failure
 * becomes a descriptive `{ ok: false }` result.
 */
@Injectable()
export class WeatherService {
  private readonly logger = new Logger(WeatherService.name);
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retryDelayMs: number;

  constructor(
    private readonly config: ConfigService,
    private readonly geocoding: GeocodingService,
  ) {
    this.baseUrl =
      this.config.get<string>('WEATHER_API_URL') ??
      'https://api.open-meteo.com/v1/forecast';
    this.timeoutMs = Number(this.config.get('HTTP_TIMEOUT_MS') ?? 10000);
    this.retryDelayMs = Number(this.config.get('WEATHER_RETRY_DELAY_MS') ?? 1000);
  }

  /** Text form, as handed to the agent's weather tool. */
  async describe(destinationName: string): Promise<string> {
    const lookup = await this.lookup(destinationName);
    return lookup.text;
  }

  async lookup(destinationName: string): Promise<WeatherLookup> {
    try {
      const coordinates = await this.geocoding.locate(destinationName);
      if (!coordinates) {
        this.logger.warn(`Could not find coordinates for ${destinationName}`);
        return {
          ok: false,
          text: `Could not find coordinates for ${destinationName}`,
        };
      }
      return await this.forecast(destinationName, coordinates);
    } catch (error) {
      this.logger.error(
        `Unexpected error fetching weather for ${destinationName}`,
        error,
      );
      return {
        ok: false,
        text: `Could not retrieve weather information for ${destinationName}`,
      };
    }
  }

  private async forecast(
    name: string,
    coordinates: Coordinates,
  ): Promise<WeatherLookup> {
    const url = `${this.baseUrl}?latitude=${coordinates.latitude}&longitude=${coordinates.longitude}&current_weather=true`;

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      const last = attempt === MAX_ATTEMPTS;
      let res: Response;

      try {
        res = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
      } catch (error) {
        const timedOut = error instanceof Error && error.name === 'TimeoutError';
        this.logger.warn(
          `Weather API ${timedOut ? 'timeout' : 'request error'} for ${name} (attempt ${attempt})`,
        );
        if (!last) {
          await this.pause();
          continue;
        }
        return {
          ok: false,
          text: timedOut
            ? `Weather service timeout for ${name}`
            : `Weather service error for ${name}`,
        };
      }

      if (!res.ok) {
        this.logger.warn(
          `Weather API returned status ${res.status} for ${name} (attempt ${attempt})`,
        );
        if (!last) {
          await this.pause();
          continue;
        }
        return {
          ok: false,
          text: `Weather service temporarily unavailable for ${name}`,
        };
      }

      const current = readCurrentWeather(await res.json());
      if (!current) {
        this.logger.warn(`No current weather data available for ${name}`);
        return {
          ok: false,
          text: `No current weather data available for ${name}`,
        };
      }

      const description = describeWeatherCode(current.weathercode);
      this.logger.log(
        `Retrieved weather for ${name}: ${description}, ${current.temperature}°C`,
      );
      return {
        ok: true,
        text: `Current weather in ${name}: ${description}, Temperature: ${current.temperature}°C`,
        description,
        temperature: current.temperature,
        coordinates,
      };
    }

    return { ok: false, text: `Weather service error for ${name}` };
  }

  private pause(): Promise<void> {
    return new Promise((res) => setTimeout(res, this.retryDelayMs));
  }
}
