import { Module } from '@nestjs/common';
import { MailModule } from '../mail/mail.module';
import { RunReportModule } from '../run-report/run-report.module';
import { ReminderService } from './reminder.service';

@Module({
  imports: [MailModule, RunReportModule],
  providers: [ReminderService],
  exports: [ReminderService],
})
export class ReminderModule { }
