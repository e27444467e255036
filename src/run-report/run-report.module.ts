import { Module } from '@nestjs/common';
import { MailModule } from '../mail/mail.module';
import { RunReportService } from './run-report.service';

@Module({
  imports: [MailModule],
  providers: [RunReportService],
  exports: [RunReportService],
})
export class RunReportModule { }
