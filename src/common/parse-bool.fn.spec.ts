import { parseBool } from '@common/parse-bool.fn';

describe('parseBool', () => {
  it.each([
    ['true', true],
    ['YES', true],
    ['1', true],
    ['false', false],
    [' no ', false],
    ['off', false],
  ])('Should parse "%s"', (raw, expected) => {
    expect(parseBool(raw)).toBe(expected);
  });

  it('Should throw on unknown value', () => {
    expect(() => parseBool('maybe')).toThrow('Cannot parse "maybe" as boolean');
  });
});
