import type { AlertEvent } from '../../types';
import { errorMessage } from '../utils/errors';
import { alertEmailBody, alertSmsBody, alertSubject } from './format';
import type { MailTransport } from './smtp';
import type { NotificationChannel } from './types';

export class EmailChannel implements NotificationChannel {
  readonly kind = 'email' as const;

  constructor(
    private readonly transport: MailTransport,
    private readonly from: string
  ) {}

  async send(alert: AlertEvent): Promise<boolean> {
    const to = alert.subscriber.address;
    try {
      await this.transport.sendMail({
        from: this.from,
        to,
        subject: alertSubject(alert),
        text: alertEmailBody(alert),
      });
      console.log(`[Alerts] Email sent to ${to} for ${alert.commodityName}`);
      return true;
    } catch (error) {
      console.error(`[Alerts] Error sending email to ${to}: ${errorMessage(error)}`);
      return false;
    }
  }
}

/**
 * SMS through a carrier's email-to-SMS gateway (e.g. 5550100@vtext.com).
 */
export class SmsChannel implements NotificationChannel {
  readonly kind = 'sms' as const;

  constructor(
    private readonly transport: MailTransport,
    private readonly from: string
  ) {}

  async send(alert: AlertEvent): Promise<boolean> {
    const to = alert.subscriber.address;
    try {
      await this.transport.sendMail({ from: this.from, to, text: alertSmsBody(alert) });
      console.log(`[Alerts] SMS sent to ${to} for ${alert.commodityName}`);
      return true;
    } catch (error) {
      console.error(`[Alerts] Error sending SMS to ${to}: ${errorMessage(error)}`);
      return false;
    }
  }
}

export const SMS_GATEWAYS: Record<string, string> = {
  verizon: '@vtext.com',
  att: '@txt.att.net',
  't-mobile': '@tmomail.net',
  sprint: '@messaging.sprintpcs.com',
  boost: '@sms.myboostmobile.com',
  cricket: '@sms.cricketwireless.net',
  uscellular: '@email.uscc.net',
};

/** "5550100" + "verizon" → "5550100@vtext.com". */
export function smsGatewayAddress(phoneNumber: string, carrier: string): string | null {
  const digits = phoneNumber.replace(/\D/g, '');
  const domain = SMS_GATEWAYS[carrier.toLowerCase()];
  if (!digits || !domain) return null;
  return `${digits}${domain}`;
}
