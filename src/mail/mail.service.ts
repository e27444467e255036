import { Inject, Injectable, Logger } from '@nestjs/common';
import { REMINDER_CONFIG, ReminderConfig } from '../config/reminder.config';
import { DeliveryResult, MAIL_TRANSPORT_FACTORY, MailTransportFactory, OutgoingMail } from './dto/mail.dto';

export function isTransportError(error: unknown): error is Error & { code: string } {
    return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

export function describeDeliveryError(error: unknown): string {
    const message = error instanceof Error ? error.message : String(error);
    return isTransportError(error) ? `SMTP error: ${message}` : `Unexpected error: ${message}`;
}

@Injectable()
export class MailService {
    private readonly logger = new Logger(MailService.name);

    constructor(
        @Inject(REMINDER_CONFIG) private readonly config: ReminderConfig,
        @Inject(MAIL_TRANSPORT_FACTORY) private readonly createTransport: MailTransportFactory,
    ) { }

    get sender(): string {
        const { senderName, address } = this.config.smtp;
        return senderName ? `${senderName} <${address}>` : address;
    }

    /**
     * Sends one message over its own SMTP session. The session is closed
     * before this resolves, whether or not the send succeeded.
     */
    async sendEmail(mail: OutgoingMail): Promise<DeliveryResult> {
        const { host, port, address, password } = this.config.smtp;

        try {
            const transporter = this.createTransport({
                host,
                port,
                secure: false, // upgraded with STARTTLS
                requireTLS: true,
                auth: {
                    user: address,
                    pass: password,
                },
            });

            try {
                const info = await transporter.sendMail({
                    from: this.sender,
                    to: mail.to,
                    subject: mail.subject,
                    html: mail.html,
                    text: mail.text,
                    attachments: mail.attachments,
                });
                this.logger.debug(`EMAIL_SENT_ID ${info.messageId}`);
                return { delivered: true, messageId: info.messageId };
            } finally {
                transporter.close();
            }
        } catch (error) {
            const reason = describeDeliveryError(error);
            this.logger.error(`${reason} (sending to ${mail.to})`);
            return { delivered: false, reason };
        }
    }
}
