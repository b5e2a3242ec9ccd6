import configuration, { validateEnv } from './configuration';

describe('configuration', () => {
  describe('validateEnv', () => {
    it('should apply defaults for an empty environment', () => {
      const env = validateEnv({});

      expect(env.DATA_DIR).toBe('./data');
      expect(env.DAILY_REPORT_WITH_GUI).toBe(true);
      expect(env.DAILY_REPORT_ENABLED).toBe(true);
      expect(env.MAX_SELECTOR_OPTIONS).toBe(100);
      expect(env.BOT_ADMIN_USER_ID).toBeUndefined();
      expect(env.NODE_ENV).toBe('development');
    });

    it('should parse boolean flags and numbers', () => {
      const env = validateEnv({
        DAILY_REPORT_WITH_GUI: 'false',
        MAX_SELECTOR_OPTIONS: '25',
        NODE_ENV: 'test',
      });

      expect(env.DAILY_REPORT_WITH_GUI).toBe(false);
      expect(env.MAX_SELECTOR_OPTIONS).toBe(25);
      expect(env.NODE_ENV).toBe('test');
    });

    it('should reject malformed values with a descriptive message', () => {
      expect(() => validateEnv({ DAILY_REPORT_ENABLED: 'yes' })).toThrow(
        /Environment validation failed:\n {2}- DAILY_REPORT_ENABLED:/,
      );
    });

    it('should reject a non-positive selector limit', () => {
      expect(() => validateEnv({ MAX_SELECTOR_OPTIONS: '0' })).toThrow(/MAX_SELECTOR_OPTIONS/);
    });
  });

  describe('factory', () => {
    const original = process.env;

    afterEach(() => {
      process.env = original;
    });

    it('should group values by concern', () => {
      process.env = { DATA_DIR: '/tmp/daily', BOT_ADMIN_USER_ID: 'U123' };

      const config = configuration();

      expect(config.paths.data).toBe('/tmp/daily');
      expect(config.home.adminUserId).toBe('U123');
      expect(config.daily).toEqual({ withGui: true, scheduled: true });
    });
  });
});
