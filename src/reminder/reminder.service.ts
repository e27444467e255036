import { Inject, Injectable, Logger } from '@nestjs/common';
import { REMINDER_CONFIG, ReminderConfig } from '../config/reminder.config';
import { MailService } from '../mail/mail.service';
import { RunResult, emptyRunResult, recordOutcome } from '../run-report/run-result';
import { RunReportService } from '../run-report/run-report.service';
import { REMINDER_SUBJECT, renderReminderHtml } from './reminder.template';
import { TenantOutcome } from './reminder.types';
import { failureFor, validateTenant } from './tenant.validator';

export type RunPhase = 'SendingReminders' | 'SendingLog';

@Injectable()
export class ReminderService {
    private readonly logger = new Logger(ReminderService.name);

    constructor(
        @Inject(REMINDER_CONFIG) private readonly config: ReminderConfig,
        private readonly mailService: MailService,
        private readonly runReportService: RunReportService,
    ) { }

    async sendReminder(record: unknown): Promise<TenantOutcome> {
        const validation = validateTenant(record);
        if (!validation.valid) {
            this.logger.error(`Skipping tenant ${validation.failure.tenantName}: ${validation.failure.reason}`);
            return { status: 'failed', failure: validation.failure };
        }

        const { tenant } = validation;
        const delivery = await this.mailService.sendEmail({
            to: tenant.email,
            subject: REMINDER_SUBJECT,
            html: renderReminderHtml(tenant, {
                paymentPortalUrl: this.config.paymentPortalUrl,
                landlordWebsiteUrl: this.config.landlordWebsiteUrl,
            }),
        });

        if (!delivery.delivered) {
            return { status: 'failed', failure: failureFor(record, delivery.reason) };
        }

        this.logger.log(`Reminder email sent successfully to ${tenant.name} (${tenant.email}).`);
        return { status: 'sent', tenant, messageId: delivery.messageId };
    }

    private enterPhase(phase: RunPhase) {
        this.logger.debug(`Phase: ${phase}`);
    }

    // one tenant at a time, in list order
    async sendReminders(records: unknown[]): Promise<RunResult> {
        let result = emptyRunResult();
        if (records.length === 0) {
            this.logger.warn('No tenants found to send emails.');
            return result;
        }

        for (const record of records) {
            let outcome: TenantOutcome;
            try {
                outcome = await this.sendReminder(record);
            } catch (error) {
                const reason = `Unexpected error: ${error instanceof Error ? error.message : String(error)}`;
                const failure = failureFor(record, reason);
                this.logger.error(`${reason} (tenant ${failure.tenantName}, ${failure.email})`);
                outcome = { status: 'failed', failure };
            }
            result = recordOutcome(result, outcome);
        }
        return result;
    }

    /** Runs both phases once each: reminders, then the log email. */
    async run(): Promise<RunResult> {
        this.logger.log('Script started.');

        this.enterPhase('SendingReminders');
        const result = await this.sendReminders(this.config.tenants);

        this.enterPhase('SendingLog');
        await this.runReportService.sendRunReport(result);

        this.logger.log('Script execution completed.');
        return result;
    }
}
