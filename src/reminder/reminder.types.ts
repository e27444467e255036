export interface Tenant {
    email: string;
    name: string;
    paymentAmount: number;
    paymentDescription: string;
    propertyLocation: string;
}

export interface FailureRecord {
    tenantName: string;
    email: string;
    reason: string;
}

export type TenantValidation =
    | { valid: true; tenant: Tenant }
    | { valid: false; failure: FailureRecord };

export type TenantOutcome =
    | { status: 'sent'; tenant: Tenant; messageId: string }
    | { status: 'failed'; failure: FailureRecord };
