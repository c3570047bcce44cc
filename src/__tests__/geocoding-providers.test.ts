/**
 * =============================================================================
 * GEOCODING PROVIDER TESTS
 * =============================================================================
 *
 * HTTP is replaced with an in-process stub; nothing leaves the process.
 */

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn()
  }
}));

import type { HttpGet, HttpResponseLike } from '../modules/geocoding/geocoding.types';
import { GoogleProvider } from '../modules/geocoding/providers/google.provider';
import { NominatimProvider } from '../modules/geocoding/providers/nominatim.provider';

function respond(status: number, body: unknown): HttpResponseLike {
  return {
    status,
    ok: status >= 200 && status < 300,
    json: async () => body
  };
}

function stubHttp(...responses: HttpResponseLike[]) {
  const queue = [...responses];
  return jest.fn<ReturnType<HttpGet>, Parameters<HttpGet>>(async () => {
    const next = queue.shift();
    if (!next) throw new Error('Unexpected request');
    return next;
  });
}

describe('NominatimProvider', () => {
  const options = {
    baseUrl: 'https://nominatim.test/',
    userAgent: 'route-test/1.0',
    timeoutMs: 1000,
    minIntervalMs: 0
  };

  it('queries /search with a User-Agent and reads the first result', async () => {
    const httpGet = stubHttp(respond(200, [
      { lat: '20.5888', lon: '-100.3899', display_name: 'Jardín Zenea, Centro' },
      { lat: '1', lon: '1' }
    ]));
    const provider = new NominatimProvider({ ...options, httpGet });

    const outcome = await provider.geocode('Main St 5, Celaya');

    expect(outcome).toEqual({
      status: 'found',
      point: { latitude: 20.5888, longitude: -100.3899 },
      displayName: 'Jardín Zenea, Centro'
    });
    expect(httpGet).toHaveBeenCalledTimes(1);
    const [url, init] = httpGet.mock.calls[0];
    expect(url).toBe('https://nominatim.test/search?q=Main+St+5%2C+Celaya&format=jsonv2&limit=1');
    expect(init.headers).toEqual({ 'User-Agent': 'route-test/1.0', Accept: 'application/json' });
  });

  it('reports an empty result list as not found', async () => {
    const provider = new NominatimProvider({ ...options, httpGet: stubHttp(respond(200, [])) });
    await expect(provider.geocode('Nowhere')).resolves.toEqual({ status: 'not_found' });
  });

  it('reports HTTP 429 as rate limited', async () => {
    const provider = new NominatimProvider({ ...options, httpGet: stubHttp(respond(429, {})) });
    await expect(provider.geocode('Calle 1')).resolves.toEqual({ status: 'rate_limited' });
  });

  it('throws on other HTTP errors', async () => {
    const provider = new NominatimProvider({ ...options, httpGet: stubHttp(respond(502, {})) });
    await expect(provider.geocode('Calle 1')).rejects.toThrow('Nominatim responded with HTTP 502');
  });

  it('throws on an unexpected payload', async () => {
    const provider = new NominatimProvider({ ...options, httpGet: stubHttp(respond(200, { error: 'oops' })) });
    await expect(provider.geocode('Calle 1')).rejects.toThrow();
  });

  it('spaces consecutive requests by minIntervalMs', async () => {
    const sentAt: number[] = [];
    const httpGet = jest.fn<ReturnType<HttpGet>, Parameters<HttpGet>>(async () => {
      sentAt.push(Date.now());
      return respond(200, []);
    });
    const provider = new NominatimProvider({ ...options, minIntervalMs: 60, httpGet });

    await Promise.all([provider.geocode('a'), provider.geocode('b')]);

    expect(sentAt).toHaveLength(2);
    expect(sentAt[1] - sentAt[0]).toBeGreaterThanOrEqual(55);
  });
});

describe('GoogleProvider', () => {
  const options = { apiKey: 'test-key', region: '', timeoutMs: 1000 };

  it('is unavailable without an API key', () => {
    expect(new GoogleProvider({ ...options, apiKey: '' }).isAvailable()).toBe(false);
    expect(new GoogleProvider(options).isAvailable()).toBe(true);
  });

  it('reads the first result of an OK response', async () => {
    const httpGet = stubHttp(respond(200, {
      status: 'OK',
      results: [{
        formatted_address: 'Av. Universidad 100, Querétaro',
        geometry: { location: { lat: 20.6, lng: -100.41 } }
      }]
    }));
    const provider = new GoogleProvider({ ...options, region: 'mx', httpGet });

    const outcome = await provider.geocode('Av. Universidad 100');

    expect(outcome).toEqual({
      status: 'found',
      point: { latitude: 20.6, longitude: -100.41 },
      displayName: 'Av. Universidad 100, Querétaro'
    });
    expect(httpGet.mock.calls[0][0]).toBe(
      'https://maps.googleapis.com/maps/api/geocode/json?address=Av.+Universidad+100&key=test-key&region=mx'
    );
  });

  it.each([
    ['ZERO_RESULTS', { status: 'not_found' }],
    ['OVER_QUERY_LIMIT', { status: 'rate_limited' }]
  ])('maps %s', async (status, expected) => {
    const provider = new GoogleProvider({ ...options, httpGet: stubHttp(respond(200, { status, results: [] })) });
    await expect(provider.geocode('Calle 1')).resolves.toEqual(expected);
  });

  it('throws on REQUEST_DENIED with the provider message', async () => {
    const provider = new GoogleProvider({
      ...options,
      httpGet: stubHttp(respond(200, { status: 'REQUEST_DENIED', error_message: 'The provided API key is invalid.' }))
    });

    await expect(provider.geocode('Calle 1')).rejects.toThrow(
      'Google Geocoding error: REQUEST_DENIED - The provided API key is invalid.'
    );
  });

  it('reports HTTP 429 as rate limited', async () => {
    const provider = new GoogleProvider({ ...options, httpGet: stubHttp(respond(429, {})) });
    await expect(provider.geocode('Calle 1')).resolves.toEqual({ status: 'rate_limited' });
  });
});
