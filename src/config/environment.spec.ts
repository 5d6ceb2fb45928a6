import { ConfigurationError } from '../common/errors/pipeline.errors';
import { validateEnvironment } from './environment';

describe('validateEnvironment', () => {
  it('fills defaults for an empty environment', () => {
    const env = validateEnvironment({});

    expect(env.IGDB_BATCH_LIMIT).toBe(100);
    expect(env.CATALOGUE_QUOTA).toBe(20);
    expect(env.MEDIA_TYPES).toEqual(['cover', 'platform_logo']);
    expect(env.LABEL_FORMATS).toEqual(['svg', 'png']);
    expect(env.CROP_PLATFORM_LOGOS).toBe(true);
    expect(env.CATALOGUE_PDF).toBe(true);
    expect(env.CATALOGUE_FONT_FILE).toBe('');
  });

  it('coerces strings from the process environment', () => {
    const env = validateEnvironment({
      IGDB_BATCH_LIMIT: '250',
      GAMES_PER_PLATFORM: '10',
      MEDIA_TYPES: 'cover, artwork',
      CROP_PLATFORM_LOGOS: 'false',
      LABEL_FORMATS: 'svg',
    });

    expect(env.IGDB_BATCH_LIMIT).toBe(250);
    expect(env.GAMES_PER_PLATFORM).toBe(10);
    expect(env.MEDIA_TYPES).toEqual(['cover', 'artwork']);
    expect(env.CROP_PLATFORM_LOGOS).toBe(false);
    expect(env.LABEL_FORMATS).toEqual(['svg']);
  });

  it('rejects a batch limit above the API maximum', () => {
    expect(() => validateEnvironment({ IGDB_BATCH_LIMIT: '501' })).toThrow(
      ConfigurationError,
    );
  });

  it('accepts pdf labels and rejects unknown label formats', () => {
    expect(validateEnvironment({ LABEL_FORMATS: 'svg,pdf' }).LABEL_FORMATS).toEqual(['svg', 'pdf']);
    expect(() => validateEnvironment({ LABEL_FORMATS: 'svg,eps' })).toThrow(
      ConfigurationError,
    );
  });
});
