import {
  DEFAULT_CONVERTER_CONFIG,
  createConverterConfig,
  loadConverterConfig,
  loadServerConfig,
} from './converter.config';

describe('converter configuration', () => {
  it('falls back to defaults when nothing is set', () => {
    expect(loadConverterConfig({})).toEqual(DEFAULT_CONVERTER_CONFIG);
  });

  it('reads typed values from the environment', () => {
    const config = loadConverterConfig({
      STEPFORGE_TARGET_WIDTH: '2560',
      STEPFORGE_TARGET_HEIGHT: '1440',
      STEPFORGE_DRAG_DURATION: '0.25',
      STEPFORGE_CAPSLOCK_MODE: 'system',
      STEPFORGE_STRICT_COORDINATES: 'true',
      STEPFORGE_PREVENT_CORNER_LOCK: '0',
    });

    expect(config).toMatchObject({
      targetWidth: 2560,
      targetHeight: 1440,
      dragDuration: 0.25,
      capsLockMode: 'system',
      strictCoordinates: true,
      preventCornerLock: false,
    });
  });

  it('produces frozen configs', () => {
    expect(Object.isFrozen(loadConverterConfig({}))).toBe(true);
    expect(Object.isFrozen(createConverterConfig({ scrollAmount: 5 }))).toBe(
      true,
    );
  });

  it('rejects malformed values', () => {
    expect(() =>
      loadConverterConfig({ STEPFORGE_TARGET_WIDTH: 'wide' }),
    ).toThrow('Invalid configuration');
    expect(() =>
      loadConverterConfig({ STEPFORGE_CAPSLOCK_MODE: 'os' }),
    ).toThrow('Invalid configuration');
    expect(() =>
      loadConverterConfig({ STEPFORGE_STRICT_COORDINATES: 'maybe' }),
    ).toThrow('Invalid configuration');
  });
});

describe('server configuration', () => {
  it('defaults the port and parser mode', () => {
    expect(loadServerConfig({})).toEqual({
      port: 9991,
      parserMode: 'auto',
      logDir: undefined,
      maxSessions: 256,
    });
  });

  it('reads overrides', () => {
    expect(
      loadServerConfig({
        STEPFORGE_PORT: '8080',
        STEPFORGE_PARSER_MODE: 'tagged',
        STEPFORGE_LOG_DIR: '/tmp/stepforge',
        STEPFORGE_MAX_SESSIONS: '16',
      }),
    ).toEqual({
      port: 8080,
      parserMode: 'tagged',
      logDir: '/tmp/stepforge',
      maxSessions: 16,
    });
  });

  it('rejects a session cap below one', () => {
    expect(() => loadServerConfig({ STEPFORGE_MAX_SESSIONS: '0' })).toThrow(
      /^Invalid configuration: /,
    );
  });
});
