import { Module } from '@nestjs/common';
import { ReminderConfigModule } from './config/reminder-config.module';
import { MailModule } from './mail/mail.module';
import { ReminderModule } from './reminder/reminder.module';
import { RunReportModule } from './run-report/run-report.module';

@Module({
  imports: [
    ReminderConfigModule,
    MailModule,
    RunReportModule,
    ReminderModule,
  ],
})
export class AppModule { }
