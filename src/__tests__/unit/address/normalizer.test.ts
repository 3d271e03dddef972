/**
 * Token normalizer tests
 */

import { describe, it, expect } from 'vitest';
import {
  canonicalDirectional,
  canonicalStreetType,
  cleanText,
  normalizeAddress,
  normalizeStreetName,
  normalizeZip,
  parseHouseNumber,
  splitStreetLabel,
} from '../../../address/normalizer.js';

describe('normalizeAddress', () => {
  it('canonicalizes every field of the key', () => {
    const result = normalizeAddress({
      houseNumber: '123',
      preDirectional: 'North',
      streetName: 'First',
      streetType: 'Avenue',
      state: 'California',
      zip: '90012-1234',
    });

    expect(result).toEqual({
      ok: true,
      key: {
        stateFips: '06',
        streetName: '1ST',
        streetType: 'AVE',
        directional: 'N',
        houseNumber: 123,
        zip: '90012',
      },
    });
  });

  it('uses the post-directional when there is no pre-directional', () => {
    const result = normalizeAddress({ houseNumber: '5', streetName: 'Main', postDirectional: 'SW' });
    expect(result.ok && result.key.directional).toBe('SW');
  });

  it('falls back to the state hint', () => {
    const result = normalizeAddress({ houseNumber: '5', streetName: 'Main' }, 'CA');
    expect(result.ok && result.key.stateFips).toBe('06');
  });

  it('prefers the address state over the hint', () => {
    const result = normalizeAddress({ houseNumber: '5', streetName: 'Main', state: 'TX' }, 'CA');
    expect(result.ok && result.key.stateFips).toBe('48');
  });

  it('leaves the state null when none is named', () => {
    const result = normalizeAddress({ houseNumber: '5', streetName: 'Main' });
    expect(result.ok && result.key.stateFips).toBeNull();
  });

  it('keeps an unknown street type as cleaned text', () => {
    const result = normalizeAddress({ houseNumber: '5', streetName: 'Main', streetType: 'Foo.' });
    expect(result.ok && result.key.streetType).toBe('FOO');
  });

  it('requires a house number', () => {
    expect(normalizeAddress({ streetName: 'Main' })).toEqual({
      ok: false,
      reason: 'incomplete_address',
      detail: 'missing house number',
    });
  });

  it('requires a street name', () => {
    expect(normalizeAddress({ houseNumber: '12' })).toEqual({
      ok: false,
      reason: 'incomplete_address',
      detail: 'missing street name',
    });
  });

  it('rejects a house number without leading digits', () => {
    const result = normalizeAddress({ houseNumber: 'A12', streetName: 'Main' });
    expect(result.ok).toBe(false);
  });
});

describe('splitStreetLabel', () => {
  it('splits leading directional, name and type', () => {
    expect(splitStreetLabel('N Main St')).toEqual({
      streetName: 'MAIN',
      streetType: 'ST',
      directional: 'N',
    });
  });

  it('splits a trailing directional', () => {
    expect(splitStreetLabel('Main St W')).toEqual({
      streetName: 'MAIN',
      streetType: 'ST',
      directional: 'W',
    });
  });

  it('keeps a directional word that is the whole name', () => {
    expect(splitStreetLabel('North St')).toEqual({
      streetName: 'NORTH',
      streetType: 'ST',
      directional: null,
    });
  });

  it('converts spelled-out ordinals', () => {
    expect(splitStreetLabel('W First Ave')).toEqual({
      streetName: '1ST',
      streetType: 'AVE',
      directional: 'W',
    });
  });

  it('leaves a single-word name alone', () => {
    expect(splitStreetLabel('Broadway')).toEqual({
      streetName: 'BROADWAY',
      streetType: null,
      directional: null,
    });
  });
});

describe('text helpers', () => {
  it('cleanText uppercases, strips punctuation and collapses spaces', () => {
    expect(cleanText("  St. Mary's-Way ")).toBe('ST MARYS-WAY');
  });

  it('canonicalStreetType maps USPS spellings', () => {
    expect(canonicalStreetType('Boulevard')).toBe('BLVD');
    expect(canonicalStreetType('st')).toBe('ST');
    expect(canonicalStreetType('Main')).toBeNull();
  });

  it('canonicalDirectional maps spelled-out directions', () => {
    expect(canonicalDirectional('northwest')).toBe('NW');
    expect(canonicalDirectional('X')).toBeNull();
  });

  it('normalizeStreetName converts ordinals word by word', () => {
    expect(normalizeStreetName('Twelfth Street Plaza')).toBe('12TH STREET PLAZA');
  });

  it('parseHouseNumber takes the leading integer', () => {
    expect(parseHouseNumber('123')).toBe(123);
    expect(parseHouseNumber('123A')).toBe(123);
    expect(parseHouseNumber('123-125')).toBe(123);
    expect(parseHouseNumber('A12')).toBeNull();
  });

  it('normalizeZip keeps the first five digits', () => {
    expect(normalizeZip('90012-1234')).toBe('90012');
    expect(normalizeZip('abc')).toBeNull();
    expect(normalizeZip(null)).toBeNull();
  });
});
