import {componentLogger, createLogger, getLogger} from "./index";

describe('Logger', () => {
  test('Creates component loggers from the shared instance', () => {
    const logger = createLogger({
      level: 'warn',
      transports: {
        json: {
          enabled: false,
        },
      },
    }, { app: 'mobile-ads-bridge', env: 'test', version: 'test' });

    expect(getLogger()).toBe(logger);
    expect(logger.level).toBe('warn');

    const child = componentLogger('registry');
    expect(child.level).toBe('warn');
  });
});
