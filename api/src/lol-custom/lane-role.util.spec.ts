import { normalizeRoleName, sortRoles } from './lane-role.util';

describe('normalizeRoleName', () => {
  it.each([
    ['TOP', 'TOP'],
    ['top', 'TOP'],
    ['jgl', 'JUNGLE'],
    ['Jungler', 'JUNGLE'],
    ['middle', 'MID'],
    ['BOT', 'BOTTOM'],
    ['adc', 'BOTTOM'],
    ['sup', 'SUPPORT'],
    ['utility', 'SUPPORT'],
    [' mid ', 'MID'],
  ])('maps %p to %s', (input, expected) => {
    expect(normalizeRoleName(input)).toBe(expected);
  });

  it('maps the unicode fallbacks with or without the variation selector', () => {
    expect(normalizeRoleName('\u2B06\uFE0F')).toBe('TOP');
    expect(normalizeRoleName('\u2B06')).toBe('TOP');
    expect(normalizeRoleName('\uD83C\uDF32')).toBe('JUNGLE');
    expect(normalizeRoleName('\uD83D\uDEE1')).toBe('SUPPORT');
  });

  it.each([null, undefined, '', 'thumbsup', '\uD83D\uDC4D'])(
    'returns null for %p',
    (input) => {
      expect(normalizeRoleName(input)).toBeNull();
    },
  );
});

describe('sortRoles', () => {
  it('orders roles from top lane to support', () => {
    expect(sortRoles(new Set(['SUPPORT', 'TOP', 'MID'] as const))).toEqual([
      'TOP',
      'MID',
      'SUPPORT',
    ]);
  });
});
