import { ConfigService } from '@nestjs/config';
import { jsonResponse } from '../../test/support/fakes';
import { GeocodingService } from './geocoding.service';

describe('GeocodingService', () => {
  let fetchMock: jest.SpiedFunction<typeof fetch>;
  let geocoding: GeocodingService;

  beforeEach(() => {
    geocoding = new GeocodingService(
      new ConfigService({ GEOCODING_API_URL: 'http://geo.test/search' }),
    );
    fetchMock = jest.spyOn(globalThis, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  it('returns the first match for the exact name', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([{ lat: '35.0116', lon: '135.7681' }]));

    expect(await geocoding.locate('Kyoto')).toEqual({
      latitude: 35.0116,
      longitude: 135.7681,
    });
    expect(fetchMock.mock.calls[0][0]).toBe(
      'http://geo.test/search?q=Kyoto&format=json&limit=1',
    );
  });

  it('retries with a city qualifier when the exact name has no match', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse([]))
      .mockResolvedValueOnce(jsonResponse([{ lat: '39.78', lon: '-89.65' }]));

    expect(await geocoding.locate('Springfield')).toEqual({
      latitude: 39.78,
      longitude: -89.65,
    });
    expect(fetchMock.mock.calls[1][0]).toBe(
      'http://geo.test/search?q=Springfield%2C%20city&format=json&limit=1',
    );
  });

  it('returns null when the service errors', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'down' }, 502));

    expect(await geocoding.locate('Kyoto')).toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('ignores results without usable coordinates', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([{ lat: 'north', lon: '1' }]));

    await expect(geocoding.search('Nowhere')).resolves.toBeNull();
  });
});
