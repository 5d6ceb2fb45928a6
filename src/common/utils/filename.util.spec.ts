import { sanitizeFileName, toFolderName } from './filename.util';

describe('toFolderName', () => {
  it('joins words with underscores and keeps case', () => {
    expect(toFolderName('Super Mario 64', 'unknown_game')).toBe('Super_Mario_64');
  });

  it('drops path-unsafe characters', () => {
    expect(
      toFolderName('The Legend of Zelda: Ocarina of Time', 'unknown_game'),
    ).toBe('The_Legend_of_Zelda_Ocarina_of_Time');
    expect(toFolderName('Sega Mega Drive/Genesis', 'unknown_platform')).toBe(
      'Sega_Mega_DriveGenesis',
    );
  });

  it('falls back when nothing usable is left', () => {
    expect(toFolderName('???', 'unknown_platform')).toBe('unknown_platform');
    expect(toFolderName(null, 'unknown_game')).toBe('unknown_game');
    expect(toFolderName('', 'unknown_game')).toBe('unknown_game');
  });
});

describe('sanitizeFileName', () => {
  it('replaces unsafe characters and collapses underscores', () => {
    expect(sanitizeFileName('cover_12_ab:c?.webp')).toBe('cover_12_ab_c_.webp');
    expect(sanitizeFileName('platform_logo__7_x.webp')).toBe('platform_logo_7_x.webp');
  });
});
