import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Coordinates } from './weather.types';

const USER_AGENT = 'travel-advisor/1.0';

@Injectable()
export class GeocodingService {
  private readonly logger = new Logger(GeocodingService.name);
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly config: ConfigService) {
    this.baseUrl =
      this.config.get<string>('GEOCODING_API_URL') ??
      'https://nominatim.openstreetmap.org/search';
    this.timeoutMs = Number(this.config.get('HTTP_TIMEOUT_MS') ?? 10000);
  }

  /** Exact name first, then `"<name>, city"`. Null when nothing matches or the service fails. */
  async locate(name: string): Promise<Coordinates | null> {
    try {
      for (const query of [name, `${name}, city`]) {
        const hit = await this.search(query);
        if (hit) {
          this.logger.log(
            `Geocoded '${query}' to: ${hit.latitude}, ${hit.longitude}`,
          );
          return hit;
        }
      }
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        this.logger.warn(`Geocoding timeout for ${name}`);
      } else {
        this.logger.warn(
          `Geocoding service error for ${name}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }
    return null;
  }

  async search(query: string): Promise<Coordinates | null> {
    const url = `${this.baseUrl}?q=${encodeURIComponent(query)}&format=json&limit=1`;
    const res = await fetch(url, {
      headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!res.ok) {
      throw new Error(`Geocoding service returned status ${res.status}`);
    }

    const body: unknown = await res.json();
    if (!Array.isArray(body) || body.length === 0) return null;

    const first: unknown = body[0];
    if (typeof first !== 'object' || first === null) return null;
    const latitude = Number(Reflect.get(first, 'lat'));
    const longitude = Number(Reflect.get(first, 'lon'));
    if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) return null;

    return { latitude, longitude };
  }
}
