import { ConfigService } from '@nestjs/config';
import { jsonResponse, timeoutError } from '../../test/support/fakes';
import { GeocodingService } from './geocoding.service';
import { describeWeatherCode } from './weather-codes';
import { WeatherService } from './weather.service';

const PARIS_HIT = [{ lat: '48.8566', lon: '2.3522', display_name: 'Paris, France' }];
const FORECAST_URL =
  'https://api.open-meteo.com/v1/forecast?latitude=48.8566&longitude=2.3522&current_weather=true';

describe('WeatherService', () => {
  let fetchMock: jest.SpiedFunction<typeof fetch>;
  let weather: WeatherService;

  beforeEach(() => {
    const config = new ConfigService({ WEATHER_RETRY_DELAY_MS: 0 });
    weather = new WeatherService(config, new GeocodingService(config));
    fetchMock = jest.spyOn(globalThis, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  it('describes the current weather of a geocoded destination', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse(PARIS_HIT))
      .mockResolvedValueOnce(
        jsonResponse({ current_weather: { temperature: 18.5, weathercode: 2 } }),
      );

    const lookup = await weather.lookup('Paris');

    expect(lookup).toEqual({
      ok: true,
      text: 'Current weather in Paris: Partly cloudy, Temperature: 18.5°C',
      description: 'Partly cloudy',
      temperature: 18.5,
      coordinates: { latitude: 48.8566, longitude: 2.3522 },
    });
    expect(fetchMock.mock.calls[1][0]).toBe(FORECAST_URL);
  });

  it('reports destinations the geocoder cannot place', async () => {
    fetchMock.mockImplementation(async () => jsonResponse([]));

    expect(await weather.describe('Atlantis')).toBe(
      'Could not find coordinates for Atlantis',
    );
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('retries a failing forecast and succeeds on a later attempt', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse(PARIS_HIT))
      .mockResolvedValueOnce(jsonResponse({ reason: 'busy' }, 500))
      .mockResolvedValueOnce(
        jsonResponse({ current_weather: { temperature: 9, weathercode: 61 } }),
      );

    expect(await weather.describe('Paris')).toBe(
      'Current weather in Paris: Slight rain, Temperature: 9°C',
    );
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('gives up after three unavailable responses', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(PARIS_HIT));
    fetchMock.mockImplementation(async () => jsonResponse({}, 503));

    const lookup = await weather.lookup('Paris');

    expect(lookup).toEqual({
      ok: false,
      text: 'Weather service temporarily unavailable for Paris',
    });
    expect(fetchMock).toHaveBeenCalledTimes(4);
  });

  it('names a timeout when every attempt times out', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(PARIS_HIT));
    fetchMock.mockImplementation(async () => {
      throw timeoutError();
    });

    expect(await weather.describe('Paris')).toBe('Weather service timeout for Paris');
  });

  it('handles a forecast without current conditions', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse(PARIS_HIT))
      .mockResolvedValueOnce(jsonResponse({ hourly: {} }));

    expect(await weather.describe('Paris')).toBe(
      'No current weather data available for Paris',
    );
  });
});

describe('describeWeatherCode', () => {
  it('maps known codes and falls back to the raw code', () => {
    expect(describeWeatherCode(0)).toBe('Clear sky');
    expect(describeWeatherCode(95)).toBe('Thunderstorm');
    expect(describeWeatherCode(7)).toBe('Weather code: 7');
  });
});
