import { IsDefined } from 'class-validator';

// Mirrors one entry of the TENANTS array. Fields hold whatever JSON value
// arrived; the validator coerces them once presence is confirmed.
export class TenantDto {
    @IsDefined()
    email!: unknown;

    @IsDefined()
    name!: unknown;

    @IsDefined()
    payment_amount!: unknown;

    @IsDefined()
    payment_description!: unknown;

    property_location?: unknown;
}
