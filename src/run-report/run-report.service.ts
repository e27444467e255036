import { Inject, Injectable, Logger } from '@nestjs/common';
import { existsSync, readFileSync } from 'fs';
import moment from 'moment';
import { basename } from 'path';
import { REMINDER_CONFIG, ReminderConfig } from '../config/reminder.config';
import { MailAttachment } from '../mail/dto/mail.dto';
import { MailService } from '../mail/mail.service';
import { RunResult } from './run-result';

export const LOG_EMAIL_SUBJECT = 'Email Reminder Logs - Execution Summary';

export function summarizeRun(result: RunResult): string[] {
    const lines = [`Reminders sent: ${result.successCount}`, `Reminders failed: ${result.failureCount}`];
    for (const failure of result.failures) {
        lines.push(`- ${failure.tenantName} (${failure.email}): ${failure.reason}`);
    }
    return lines;
}

export function composeLogEmailBody(result: RunResult, runAt: Date): string {
    return [
        'Hello,',
        '',
        `Please find attached the log file for the reminder run of ${moment(runAt).utc().format('D MMMM YYYY, HH:mm')} UTC.`,
        '',
        ...summarizeRun(result),
        '',
        'Best regards,',
        'Your Automated Email System',
        '',
    ].join('\n');
}

@Injectable()
export class RunReportService {
    private readonly logger = new Logger(RunReportService.name);

    constructor(
        @Inject(REMINDER_CONFIG) private readonly config: ReminderConfig,
        private readonly mailService: MailService,
    ) { }

    logSummary(result: RunResult) {
        for (const line of summarizeRun(result)) {
            this.logger.log(line);
        }
    }

    readLogAttachment(): MailAttachment | undefined {
        const path = this.config.logFilePath;
        if (!existsSync(path)) {
            this.logger.error(`Log file not found at ${path}. Cannot attach to log email.`);
            return undefined;
        }
        return { filename: basename(path), content: readFileSync(path) };
    }

    /**
     * Emails the run log to the landlord. Every failure here ends as a log
     * line; the reminder phase has already finished and is not affected.
     */
    async sendRunReport(result: RunResult, runAt: Date = new Date()): Promise<boolean> {
        try {
            this.logSummary(result);
            const attachment = this.readLogAttachment();

            const delivery = await this.mailService.sendEmail({
                to: this.config.landlordEmail,
                subject: LOG_EMAIL_SUBJECT,
                text: composeLogEmailBody(result, runAt),
                attachments: attachment ? [attachment] : [],
            });

            if (!delivery.delivered) {
                this.logger.error(`Log email could not be sent: ${delivery.reason}`);
                return false;
            }
            this.logger.log('Log email sent successfully to the landlord.');
            return true;
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            this.logger.error(`Unexpected error when sending log email: ${reason}`);
            return false;
        }
    }
}
