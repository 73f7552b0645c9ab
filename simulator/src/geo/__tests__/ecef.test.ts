import { describe, it, expect } from 'vitest';
import { WGS84_SEMI_MAJOR_AXIS, toECEF, withEcef } from '../ecef.js';

describe('toECEF', () => {
  it('puts the equator/prime meridian crossing on the x axis', () => {
    const { x, y, z } = toECEF(0, 0, 0);
    expect(x).toBe(WGS84_SEMI_MAJOR_AXIS);
    expect(y).toBe(0);
    expect(z).toBe(0);
  });

  it('adds altitude along the normal', () => {
    expect(toECEF(0, 0, 100).x).toBe(WGS84_SEMI_MAJOR_AXIS + 100);
  });

  it('puts longitude 90 on the y axis', () => {
    const { x, y, z } = toECEF(0, 90, 0);
    expect(x).toBeCloseTo(0, 6);
    expect(y).toBeCloseTo(6378137, 6);
    expect(z).toBe(0);
  });

  it('puts the north pole at the semi-minor axis', () => {
    const { x, y, z } = toECEF(90, 0, 0);
    expect(x).toBeCloseTo(0, 6);
    expect(y).toBe(0);
    expect(z).toBeCloseTo(6356752.3142, 3);
  });

  it('converts a point in the western hemisphere', () => {
    const { x, y, z } = toECEF(37.417747, -122.086086, 10);
    expect(x).toBeCloseTo(-2694191.434, 2);
    expect(y).toBeCloseTo(-4297227.005, 2);
    expect(z).toBeCloseTo(3854323.703, 2);
  });

  it('converts a point in the southern hemisphere', () => {
    const { x, y, z } = toECEF(-33.8688, 151.2093, 58);
    expect(x).toBeCloseTo(-4646093.477, 2);
    expect(y).toBeCloseTo(2553229.536, 2);
    expect(z).toBeCloseTo(-3534404.711, 2);
  });

  it('returns the same triple for the same input', () => {
    expect(toECEF(48.8584, 2.2945, 35)).toEqual(toECEF(48.8584, 2.2945, 35));
  });
});

describe('withEcef', () => {
  it('defaults a missing altitude to sea level', () => {
    const point = withEcef({ latitude: 10, longitude: 20 });
    expect(point.altitude).toBe(0);
    expect(point.ecef).toEqual(toECEF(10, 20, 0));
  });

  it('does not modify the input point', () => {
    const input = { latitude: 1, longitude: 2, altitude: 3 };
    const point = withEcef(input);
    expect(input).toEqual({ latitude: 1, longitude: 2, altitude: 3 });
    expect(point).not.toBe(input);
    expect(point.ecef).toEqual(toECEF(1, 2, 3));
  });
});
