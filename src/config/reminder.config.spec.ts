import { LoggerService } from '@nestjs/common';
import { resolve } from 'path';
import {
  ConfigurationError,
  EnvSource,
  isValidCronExpression,
  loadReminderConfig,
  parsePort,
  parseTenants,
  resolveLogFilePath,
} from './reminder.config';

function createLogger() {
  return {
    log: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
  } satisfies LoggerService;
}

const baseEnv: EnvSource = {
  SMTP_SERVER: 'smtp.example.com',
  SMTP_PORT: '587',
  EMAIL_ADDRESS: 'reminders@example.com',
  EMAIL_PASSWORD: 'test-secret',
  LANDLORD_EMAIL: 'landlord@example.com',
  TENANTS: '[{"email":"a@x.com","name":"Jo","payment_amount":"950.5","payment_description":"May rent"}]',
};

describe('loadReminderConfig', () => {
  it('builds the config from a complete environment', () => {
    const logger = createLogger();
    const config = loadReminderConfig({ ...baseEnv, SENDER_NAME: ' Rental Office ' }, logger);

    expect(config.smtp).toEqual({
      host: 'smtp.example.com',
      port: 587,
      address: 'reminders@example.com',
      password: 'test-secret',
      senderName: 'Rental Office',
    });
    expect(config.landlordEmail).toBe('landlord@example.com');
    expect(config.tenants).toEqual([
      { email: 'a@x.com', name: 'Jo', payment_amount: '950.5', payment_description: 'May rent' },
    ]);
    expect(config.schedule).toBeUndefined();
    expect(config.paymentPortalUrl).toBeUndefined();
    expect(logger.error).not.toHaveBeenCalled();
    expect(logger.log).toHaveBeenCalledWith('Loaded 1 tenant record(s).');
  });

  it('names every missing or empty SMTP setting', () => {
    const env = { ...baseEnv, EMAIL_PASSWORD: undefined, LANDLORD_EMAIL: '' };

    expect(() => loadReminderConfig(env, createLogger())).toThrow(
      new ConfigurationError('Missing SMTP environment variables: EMAIL_PASSWORD, LANDLORD_EMAIL.'),
    );
  });

  it('rejects a port that is not an integer', () => {
    const env = { ...baseEnv, SMTP_PORT: 'abc' };

    expect(() => loadReminderConfig(env, createLogger())).toThrow('Invalid SMTP_PORT value: abc');
  });

  it('reports a bad tenant list before failing on the port', () => {
    const logger = createLogger();
    const env = { ...baseEnv, SMTP_PORT: 'abc', TENANTS: 'not json' };

    expect(() => loadReminderConfig(env, logger)).toThrow(ConfigurationError);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('continues with no tenants when TENANTS is not JSON', () => {
    const logger = createLogger();
    const config = loadReminderConfig({ ...baseEnv, TENANTS: 'not json' }, logger);

    expect(config.tenants).toEqual([]);
    expect(logger.error).toHaveBeenCalledWith(
      expect.stringContaining('TENANTS environment variable contains invalid JSON:'),
    );
  });

  it('rejects an invalid schedule expression', () => {
    const env = { ...baseEnv, REMINDER_CRON: 'every morning' };

    expect(() => loadReminderConfig(env, createLogger())).toThrow('Invalid REMINDER_CRON value: every morning');
  });

  it('keeps a valid schedule expression', () => {
    const config = loadReminderConfig({ ...baseEnv, REMINDER_CRON: '0 9 * * *' }, createLogger());

    expect(config.schedule).toBe('0 9 * * *');
  });
});

describe('parseTenants', () => {
  it('logs and returns nothing when the variable is absent', () => {
    const logger = createLogger();

    expect(parseTenants(undefined, logger)).toEqual([]);
    expect(logger.error).toHaveBeenCalledWith('TENANTS environment variable is missing.');
  });

  it('logs and returns nothing when the JSON is not an array', () => {
    const logger = createLogger();

    expect(parseTenants('{"email":"a@x.com"}', logger)).toEqual([]);
    expect(logger.error).toHaveBeenCalledWith('TENANTS environment variable should be a JSON array of tenant objects.');
  });

  it('keeps records of any shape for later validation', () => {
    const logger = createLogger();

    expect(parseTenants('[1, {"name":"Jo"}]', logger)).toEqual([1, { name: 'Jo' }]);
  });
});

describe('parsePort', () => {
  it('accepts integers with surrounding whitespace', () => {
    expect(parsePort(' 2525 ')).toBe(2525);
  });

  it.each(['587.0', '', 'twenty'])('rejects %p', (raw) => {
    expect(() => parsePort(raw)).toThrow(`Invalid SMTP_PORT value: ${raw}`);
  });
});

describe('isValidCronExpression', () => {
  it('accepts a five field expression', () => {
    expect(isValidCronExpression('0 9 * * *')).toBe(true);
  });

  it('rejects too few fields', () => {
    expect(isValidCronExpression('0 9')).toBe(false);
  });
});

describe('resolveLogFilePath', () => {
  it('defaults to email_reminder.log in the working directory', () => {
    expect(resolveLogFilePath({}, '/srv/reminders')).toBe(resolve('/srv/reminders', 'email_reminder.log'));
  });

  it('honours REMINDER_LOG_FILE', () => {
    expect(resolveLogFilePath({ REMINDER_LOG_FILE: 'logs/run.log' }, '/srv/reminders')).toBe(
      resolve('/srv/reminders', 'logs/run.log'),
    );
  });
});
