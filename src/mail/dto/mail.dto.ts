import type SMTPTransport from 'nodemailer/lib/smtp-transport';

export const MAIL_TRANSPORT_FACTORY = 'MAIL_TRANSPORT_FACTORY';

export interface MailAttachment {
    filename: string;
    content: Buffer;
}

export interface OutgoingMail {
    to: string;
    subject: string;
    html?: string;
    text?: string;
    attachments?: MailAttachment[];
}

export interface MailTransport {
    sendMail(mail: {
        from: string;
        to: string;
        subject: string;
        html?: string;
        text?: string;
        attachments?: MailAttachment[];
    }): Promise<{ messageId: string }>;
    close(): void;
}

export type MailTransportFactory = (options: SMTPTransport.Options) => MailTransport;

export type DeliveryResult =
    | { delivered: true; messageId: string }
    | { delivered: false; reason: string };
