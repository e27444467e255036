import { LoggerService } from '@nestjs/common';
import { CronTime } from 'cron';
import * as Joi from 'joi';
import { resolve } from 'path';

export const REMINDER_CONFIG = 'REMINDER_CONFIG';

export const DEFAULT_LOG_FILE = 'email_reminder.log';

export type EnvSource = Record<string, string | undefined>;

export interface SmtpSettings {
    host: string;
    port: number;
    address: string;
    password: string;
    senderName?: string;
}

export interface ReminderConfig {
    smtp: SmtpSettings;
    landlordEmail: string;
    // raw records; each one is validated when its reminder is processed
    tenants: unknown[];
    logFilePath: string;
    paymentPortalUrl?: string;
    landlordWebsiteUrl?: string;
    schedule?: string;
}

export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export const SMTP_ENV_KEYS = [
    'SMTP_SERVER',
    'SMTP_PORT',
    'EMAIL_ADDRESS',
    'EMAIL_PASSWORD',
    'LANDLORD_EMAIL',
] as const;

export const OPTIONAL_ENV_KEYS = [
    'TENANTS',
    'SENDER_NAME',
    'PAYMENT_PORTAL_URL',
    'LANDLORD_WEBSITE_URL',
    'REMINDER_LOG_FILE',
    'REMINDER_CRON',
] as const;

type SmtpEnv = Record<(typeof SMTP_ENV_KEYS)[number], string>;

// Joi rejects both absent and empty strings here
export const smtpEnvSchema = Joi.object<SmtpEnv, true>({
    SMTP_SERVER: Joi.string().required(),
    SMTP_PORT: Joi.string().required(),
    EMAIL_ADDRESS: Joi.string().required(),
    EMAIL_PASSWORD: Joi.string().required(),
    LANDLORD_EMAIL: Joi.string().required(),
}).unknown(true);

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

export function resolveLogFilePath(env: EnvSource, cwd: string = process.cwd()): string {
    const configured = env.REMINDER_LOG_FILE?.trim();
    return resolve(cwd, configured ? configured : DEFAULT_LOG_FILE);
}

function readSmtpEnv(env: EnvSource): SmtpEnv {
    const result = smtpEnvSchema.validate(env, { abortEarly: false });
    if (result.error !== undefined) {
        const failedKeys = new Set(result.error.details.map((detail) => detail.context?.key));
        const missing = SMTP_ENV_KEYS.filter((key) => failedKeys.has(key));
        throw new ConfigurationError(`Missing SMTP environment variables: ${missing.join(', ')}.`);
    }
    return result.value;
}

/**
 * Parses the TENANTS variable. Problems here degrade the run to zero tenants
 * instead of stopping it, so the log email still goes out.
 */
export function parseTenants(raw: string | undefined, logger: LoggerService): unknown[] {
    if (!raw) {
        logger.error('TENANTS environment variable is missing.');
        return [];
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        logger.error(`TENANTS environment variable contains invalid JSON: ${reason}`);
        return [];
    }

    if (!Array.isArray(parsed)) {
        logger.error('TENANTS environment variable should be a JSON array of tenant objects.');
        return [];
    }

    logger.log(`Loaded ${parsed.length} tenant record(s).`);
    return parsed;
}

export function parsePort(raw: string): number {
    if (!INTEGER_PATTERN.test(raw)) {
        throw new ConfigurationError(`Invalid SMTP_PORT value: ${raw}`);
    }
    return Number.parseInt(raw.trim(), 10);
}

export function isValidCronExpression(expression: string): boolean {
    try {
        new CronTime(expression, 'UTC');
        return true;
    } catch {
        return false;
    }
}

function optional(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

export function loadReminderConfig(env: EnvSource, logger: LoggerService): ReminderConfig {
    const smtpEnv = readSmtpEnv(env);
    const tenants = parseTenants(env.TENANTS, logger);
    const port = parsePort(smtpEnv.SMTP_PORT);

    const schedule = optional(env.REMINDER_CRON);
    if (schedule && !isValidCronExpression(schedule)) {
        throw new ConfigurationError(`Invalid REMINDER_CRON value: ${schedule}`);
    }

    return {
        smtp: {
            host: smtpEnv.SMTP_SERVER,
            port,
            address: smtpEnv.EMAIL_ADDRESS,
            password: smtpEnv.EMAIL_PASSWORD,
            senderName: optional(env.SENDER_NAME),
        },
        landlordEmail: smtpEnv.LANDLORD_EMAIL,
        tenants,
        logFilePath: resolveLogFilePath(env),
        paymentPortalUrl: optional(env.PAYMENT_PORTAL_URL),
        landlordWebsiteUrl: optional(env.LANDLORD_WEBSITE_URL),
        schedule,
    };
}
