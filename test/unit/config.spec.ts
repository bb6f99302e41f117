import {
  EnvironmentVariables,
  buildModuleConfig,
  parseFlag,
  resolveLogLevels,
  validate,
} from '../../src';

describe('Configuration', () => {
  const required = { BOT_TOKEN: 'test-bot-token', WEBHOOK_API_KEY: 'test-secret' };

  describe('resolveLogLevels', () => {
    it('should enable error, fatal, warn and log by default', () => {
      expect(resolveLogLevels()).toEqual(['error', 'fatal', 'warn', 'log']);
    });

    it('should map each level name case-insensitively', () => {
      expect(resolveLogLevels('error')).toEqual(['error', 'fatal']);
      expect(resolveLogLevels('Warning')).toEqual(['error', 'fatal', 'warn']);
      expect(resolveLogLevels('WARN')).toEqual(['error', 'fatal', 'warn']);
      expect(resolveLogLevels(' debug ')).toEqual(['error', 'fatal', 'warn', 'log', 'debug']);
      expect(resolveLogLevels('VERBOSE')).toEqual([
        'error',
        'fatal',
        'warn',
        'log',
        'debug',
        'verbose',
      ]);
    });

    it('should fall back to the info set for unknown names', () => {
      expect(resolveLogLevels('chatty')).toEqual(['error', 'fatal', 'warn', 'log']);
    });
  });

  describe('parseFlag', () => {
    it.each(['true', 'TRUE', '1', 'yes', ' Yes '])('should read %p as true', (value) => {
      expect(parseFlag(value)).toBe(true);
    });

    it.each(['false', '0', 'no', '', 'on', undefined])('should read %p as false', (value) => {
      expect(parseFlag(value)).toBe(false);
    });

    it('should pass booleans through', () => {
      expect(parseFlag(true)).toBe(true);
      expect(parseFlag(false)).toBe(false);
    });
  });

  describe('validate', () => {
    it('should apply defaults for optional variables', () => {
      const env = validate({ ...required });

      expect(env).toBeInstanceOf(EnvironmentVariables);
      expect(env).toMatchObject({
        BOT_TOKEN: 'test-bot-token',
        WEBHOOK_API_KEY: 'test-secret',
        LOG_LEVEL: 'INFO',
        USER_TOKENS_FILE: 'api_tokens.json',
        SKIP_VERIFY: false,
        WEB_SERVER_HOST: '0.0.0.0',
        WEB_SERVER_PORT: 8080,
        MERCHANT_API_TIMEOUT_MS: 10000,
      });
    });

    it('should convert string values from the environment', () => {
      const env = validate({
        ...required,
        SKIP_VERIFY: 'yes',
        WEB_SERVER_PORT: '9000',
        MERCHANT_API_TIMEOUT_MS: '2500',
        MERCHANT_API_URL_START: 'https://merchant.internal:8443/api/v1/',
      });

      expect(env.SKIP_VERIFY).toBe(true);
      expect(env.WEB_SERVER_PORT).toBe(9000);
      expect(env.MERCHANT_API_TIMEOUT_MS).toBe(2500);
      expect(env.MERCHANT_API_URL_START).toBe('https://merchant.internal:8443/api/v1/');
    });

    it('should report every missing required variable', () => {
      expect(() => validate({})).toThrow(/^Invalid environment configuration:\n- BOT_TOKEN: /);
      expect(() => validate({})).toThrow(/\n- WEBHOOK_API_KEY: /);
    });

    it('should reject a port out of range', () => {
      expect(() => validate({ ...required, WEB_SERVER_PORT: '70000' })).toThrow(
        /- WEB_SERVER_PORT: /,
      );
    });

    it('should reject a base URL without a protocol', () => {
      expect(() => validate({ ...required, MERCHANT_API_URL_START: 'merchant.internal/api' })).toThrow(
        /- MERCHANT_API_URL_START: /,
      );
    });
  });

  describe('buildModuleConfig', () => {
    it('should describe a Telegram deployment backed by the credential file', () => {
      const env = validate({ ...required, SKIP_VERIFY: 'true', USER_TOKENS_FILE: '/etc/bot/tokens.json' });

      expect(buildModuleConfig(env)).toEqual({
        credentials: { type: 'file', path: '/etc/bot/tokens.json' },
        api: {
          baseUrl: 'http://127.0.0.1:8000/zenithion/api/v1/',
          verifyTls: false,
          timeoutMs: 10000,
        },
        transport: { type: 'telegraf', botToken: 'test-bot-token' },
        webhook: { secret: 'test-secret' },
      });
    });

    it('should need only the variables the module uses', () => {
      const config = buildModuleConfig({
        BOT_TOKEN: 'test-bot-token',
        USER_TOKENS_FILE: 'tokens.json',
        SKIP_VERIFY: false,
        WEBHOOK_API_KEY: 'test-secret',
        MERCHANT_API_URL_START: 'http://merchant.test/api/v1/',
        MERCHANT_API_TIMEOUT_MS: 2500,
      });

      expect(config.api).toEqual({
        baseUrl: 'http://merchant.test/api/v1/',
        verifyTls: true,
        timeoutMs: 2500,
      });
    });
  });
});
