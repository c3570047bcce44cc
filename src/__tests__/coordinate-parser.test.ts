/**
 * =============================================================================
 * COORDINATE PARSER TESTS
 * =============================================================================
 */

import {
  applyCityHint,
  parseCoordinateString,
  splitAddressLines
} from '../modules/geocoding/coordinate-parser';

describe('parseCoordinateString', () => {
  it.each([
    ['20.56912,-100.42088', { latitude: 20.56912, longitude: -100.42088 }],
    ['20.5, -100.4', { latitude: 20.5, longitude: -100.4 }],
    ['  -33.4489 -70.6693  ', { latitude: -33.4489, longitude: -70.6693 }]
  ])('reads %p', (input, expected) => {
    expect(parseCoordinateString(input)).toEqual(expected);
  });

  it.each([
    'Av. Universidad 100',
    '20,-100',
    '20.5',
    '95.0, 10.0',
    '20.5, -190.0',
    '20.5, -100.4 Centro'
  ])('does not treat %p as coordinates', (input) => {
    expect(parseCoordinateString(input)).toBeNull();
  });
});

describe('applyCityHint', () => {
  it('appends the city when the address does not mention it', () => {
    expect(applyCityHint('Av. Universidad 100', 'Querétaro')).toBe('Av. Universidad 100, Querétaro');
  });

  it('leaves an address that already names the city', () => {
    expect(applyCityHint('Calle 5 de Mayo 12, QUERETARO', 'Queretaro')).toBe('Calle 5 de Mayo 12, QUERETARO');
  });

  it('ignores a missing or blank hint', () => {
    expect(applyCityHint('Calle 5 de Mayo 12')).toBe('Calle 5 de Mayo 12');
    expect(applyCityHint('Calle 5 de Mayo 12', '   ')).toBe('Calle 5 de Mayo 12');
  });

  it('trims the hint', () => {
    expect(applyCityHint('Calle 5 de Mayo 12', '  Celaya ')).toBe('Calle 5 de Mayo 12, Celaya');
  });
});

describe('splitAddressLines', () => {
  it('keeps one trimmed address per non-blank line', () => {
    expect(splitAddressLines('Calle 1\n\n  Calle 2  \r\n20.6, -100.4\n')).toEqual([
      'Calle 1',
      'Calle 2',
      '20.6, -100.4'
    ]);
  });

  it('returns nothing for blank text', () => {
    expect(splitAddressLines(' \n\t\n')).toEqual([]);
  });
});
