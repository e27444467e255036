import { Global, Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { EnvSource, OPTIONAL_ENV_KEYS, REMINDER_CONFIG, SMTP_ENV_KEYS, loadReminderConfig } from './reminder.config';

function readEnv(config: ConfigService): EnvSource {
  const env: EnvSource = {};
  for (const key of [...SMTP_ENV_KEYS, ...OPTIONAL_ENV_KEYS]) {
    env[key] = config.get<string>(key);
  }
  return env;
}

@Global()
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
  ],
  providers: [
    {
      provide: REMINDER_CONFIG,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => loadReminderConfig(readEnv(config), new Logger('ReminderConfig')),
    },
  ],
  exports: [REMINDER_CONFIG],
})
export class ReminderConfigModule { }
