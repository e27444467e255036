import { Tenant } from './reminder.types';

export const REMINDER_SUBJECT = 'Rent Payment Reminder';

export interface ReminderLinks {
    paymentPortalUrl?: string;
    landlordWebsiteUrl?: string;
}

// Intl.NumberFormatOptions in the ES2021 lib has no roundingMode yet
const amountFormatOptions: Intl.NumberFormatOptions & { roundingMode: 'halfEven' } = {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
    useGrouping: false,
    roundingMode: 'halfEven',
};

const amountFormat = new Intl.NumberFormat('en-US', amountFormatOptions);

export function formatAmount(amount: number): string {
    return `$${amountFormat.format(amount)}`;
}

function payNowButton(url: string): string {
    return `
              <p style="text-align: center; margin: 30px 0;">
                <a href="${url}" style="display: inline-block; padding: 10px 20px; font-size: 16px; color: #ffffff; background-color: #ff9500; text-decoration: none; border-radius: 5px;">
                  Pay Now
                </a>
              </p>`;
}

function websiteLink(url: string): string {
    return `
              <p style="font-size: 16px; color: #555;">
                If you have any questions or need more information, please visit:
                <a href="${url}" style="color: #1a0dab; text-decoration: none;">${url}</a>
              </p>`;
}

// Tenant values are interpolated verbatim: the TENANTS list is written by the
// operator, not by the recipients.
export function renderReminderHtml(tenant: Tenant, links: ReminderLinks = {}): string {
    const amount = formatAmount(tenant.paymentAmount);

    return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <title>${REMINDER_SUBJECT}</title>
</head>
<body style="font-family: Arial, sans-serif; background-color: #f4f6f9; margin: 0; padding: 0;">
  <table width="100%" cellspacing="0" cellpadding="0" style="padding: 30px;">
    <tr>
      <td align="center">
        <table cellpadding="0" cellspacing="0" style="background-color: #ffffff; border-radius: 8px; padding: 30px;">
          <tr>
            <td align="left">
              <p style="font-size: 16px; color: #555;">Dear <strong>${tenant.name}</strong>,</p>

              <p style="font-size: 16px; color: #555;">
                This is a friendly reminder that your rent payment of <strong>${amount}</strong> is due soon.
              </p>

              <h3 style="color: #2b2d42; border-bottom: 1px solid #e0e0e0; padding-bottom: 6px;">Payment Details</h3>
              <table cellpadding="8" cellspacing="0" width="100%" style="font-size: 15px; color: #555;">
                <tr>
                  <td width="35%"><strong>Property:</strong></td>
                  <td>${tenant.propertyLocation}</td>
                </tr>
                <tr>
                  <td><strong>Description:</strong></td>
                  <td>${tenant.paymentDescription}</td>
                </tr>
                <tr>
                  <td><strong>Amount:</strong></td>
                  <td><strong>${amount}</strong></td>
                </tr>
              </table>

              <p style="font-size: 16px; color: #555; margin-top: 20px;">
                If payment is not received by the 5th day of the month, a 10% late fee will be imposed.
              </p>
${links.paymentPortalUrl ? payNowButton(links.paymentPortalUrl) : ''}${links.landlordWebsiteUrl ? websiteLink(links.landlordWebsiteUrl) : ''}
              <p style="font-size: 16px; color: #555;">
                Thank you!<br/><br/>Have a great day!
              </p>
            </td>
          </tr>
        </table>
      </td>
    </tr>
  </table>
</body>
</html>
`;
}
