import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { TenantDto } from './dto/tenant.dto';
import { FailureRecord, TenantValidation } from './reminder.types';

export const REQUIRED_TENANT_FIELDS = ['email', 'name', 'payment_amount', 'payment_description'] as const;

export const UNKNOWN_VALUE = 'Unknown';
export const DEFAULT_PROPERTY_LOCATION = 'N/A';

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stringifyValue(value: unknown): string {
    if (typeof value === 'string') {
        return value;
    }
    return JSON.stringify(value) ?? String(value);
}

function displayField(record: Record<string, unknown>, field: string): string {
    const value = record[field];
    return value === undefined || value === null ? UNKNOWN_VALUE : stringifyValue(value);
}

export function failureFor(record: unknown, reason: string): FailureRecord {
    if (!isRecord(record)) {
        return { tenantName: UNKNOWN_VALUE, email: UNKNOWN_VALUE, reason };
    }
    return {
        tenantName: displayField(record, 'name'),
        email: displayField(record, 'email'),
        reason,
    };
}

/** Accepts finite numbers and plain decimal strings such as "950.5" or " 1e3 ". */
export function parsePaymentAmount(value: unknown): number | undefined {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : undefined;
    }
    if (typeof value !== 'string') {
        return undefined;
    }
    const trimmed = value.trim();
    if (!DECIMAL_PATTERN.test(trimmed)) {
        return undefined;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : undefined;
}

export function validateTenant(record: unknown): TenantValidation {
    if (!isRecord(record)) {
        return { valid: false, failure: failureFor(record, 'Invalid tenant record: expected an object') };
    }

    const dto = plainToInstance(TenantDto, record);
    const failedProperties = new Set(validateSync(dto).map((error) => error.property));
    const missing = REQUIRED_TENANT_FIELDS.filter((field) => failedProperties.has(field));
    if (missing.length > 0) {
        return { valid: false, failure: failureFor(record, `Missing fields: ${missing.join(', ')}`) };
    }

    const paymentAmount = parsePaymentAmount(dto.payment_amount);
    if (paymentAmount === undefined) {
        return {
            valid: false,
            failure: failureFor(record, `Invalid payment_amount: ${stringifyValue(dto.payment_amount)}`),
        };
    }

    const location = dto.property_location;
    return {
        valid: true,
        tenant: {
            email: stringifyValue(dto.email),
            name: stringifyValue(dto.name),
            paymentAmount,
            paymentDescription: stringifyValue(dto.payment_description),
            propertyLocation:
                location === undefined || location === null ? DEFAULT_PROPERTY_LOCATION : stringifyValue(location),
        },
    };
}
