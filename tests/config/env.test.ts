import { validateEnv } from '../../src/config/env';

describe('validateEnv', () => {
  it('should apply defaults', () => {
    const env = validateEnv({});

    expect(env.SCRAPER_INTERVAL_HOURS).toBe(1);
    expect(env.PAGE_RETRIES).toBe(3);
    expect(env.ARTICLE_RETRIES).toBe(3);
    expect(env.HEADLESS).toBe(true);
  });

  it.each(['1', '6', '12', '24'])('should accept an interval of %s hours', (hours) => {
    expect(validateEnv({ SCRAPER_INTERVAL_HOURS: hours }).SCRAPER_INTERVAL_HOURS).toBe(Number(hours));
  });

  it.each(['5', '13'])('should reject an interval of %s hours', (hours) => {
    expect(() => validateEnv({ SCRAPER_INTERVAL_HOURS: hours })).toThrow(
      'must divide 24 so that ticks stay evenly spaced'
    );
  });
});
