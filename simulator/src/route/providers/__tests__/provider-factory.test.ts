import { describe, it, expect } from 'vitest';
import { GoogleMapsProvider } from '../google-maps.js';
import { createRouteProvider } from '../provider-factory.js';

describe('createRouteProvider', () => {
  it('requires an API key', () => {
    expect(() => createRouteProvider({ mapsApiKey: undefined, mapsBaseUrl: 'https://maps.example.test' })).toThrow(
      'MAPS_API_KEY not set in environment',
    );
  });

  it('builds a Google Maps provider', () => {
    const provider = createRouteProvider({ mapsApiKey: 'test-key', mapsBaseUrl: 'https://maps.example.test' });
    expect(provider).toBeInstanceOf(GoogleMapsProvider);
  });
});
