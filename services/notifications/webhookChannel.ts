import axios from 'axios';
import type { AxiosInstance } from 'axios';

import type { AlertEvent } from '../../types';
import { errorMessage } from '../utils/errors';
import { alertSubject, signedPercent } from './format';
import type { NotificationChannel } from './types';

export interface WebhookPayload {
  content: string;
  embeds: {
    title: string;
    color: number;
    fields: { name: string; value: string; inline: boolean }[];
    timestamp: string;
  }[];
}

const UP_COLOR = 0x22c55e;
const DOWN_COLOR = 0xef4444;

/** Discord/Slack-compatible JSON body. */
export function webhookPayload(alert: AlertEvent, now: Date = new Date()): WebhookPayload {
  return {
    content: alertSubject(alert),
    embeds: [
      {
        title: `${alert.commodityName} (${alert.category})`,
        color: alert.pctDaily >= 0 ? UP_COLOR : DOWN_COLOR,
        fields: [
          { name: 'Price', value: `${alert.price.toFixed(2)} ${alert.unit}`.trimEnd(), inline: true },
          { name: 'Daily', value: signedPercent(alert.pctDaily), inline: true },
          { name: 'Weekly', value: alert.pctWeekly === null ? 'n/a' : signedPercent(alert.pctWeekly), inline: true },
          { name: 'Date', value: alert.quoteDate, inline: true },
        ],
        timestamp: now.toISOString(),
      },
    ],
  };
}

export class WebhookChannel implements NotificationChannel {
  readonly kind = 'webhook' as const;

  constructor(
    private readonly http: AxiosInstance = axios,
    private readonly timeoutMs = 10_000
  ) {}

  async send(alert: AlertEvent): Promise<boolean> {
    const url = alert.subscriber.address;
    try {
      await this.http.post(url, webhookPayload(alert), {
        headers: { 'Content-Type': 'application/json' },
        timeout: this.timeoutMs,
      });
      console.log(`[Alerts] Webhook notified for ${alert.commodityName}`);
      return true;
    } catch (error) {
      console.error(`[Alerts] Webhook delivery failed for ${alert.commodityName}: ${errorMessage(error)}`);
      return false;
    }
  }
}
