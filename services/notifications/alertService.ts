/**
 * Price alerts: match subscriptions against today's quotes and hand the
 * resulting events to the configured channels.
 */

import type { AlertEvent, QuoteRecord, Subscriber, Subscription } from '../../types';
import type { ChannelRegistry } from './types';

export interface AlertDispatchSummary {
    matched: number;
    sent: number;
    failed: number;
    skipped: number; // no channel configured for the subscriber's kind
}

const subscribersOf = (s: Subscription): Subscriber[] => {
    const out: Subscriber[] = [];
    if (s.email) out.push({ channel: 'email', address: s.email });
    if (s.smsAddress) out.push({ channel: 'sms', address: s.smsAddress });
    if (s.webhookUrl) out.push({ channel: 'webhook', address: s.webhookUrl });
    return out;
};

/**
 * One event per (subscription, subscriber) whose commodity moved at least
 * `minPercentChange` today. Names match case-insensitively; a missing daily
 * figure never triggers.
 */
export function buildAlertEvents(records: readonly QuoteRecord[], subscriptions: readonly Subscription[]): AlertEvent[] {
    const byName = new Map(records.map(r => [r.commodityName.toLowerCase(), r]));
    const events: AlertEvent[] = [];

    for (const subscription of subscriptions) {
        const record = byName.get(subscription.commodityName.trim().toLowerCase());
        if (!record) {
            console.log(`[Alerts] No quote for ${subscription.commodityName} today - skipping`);
            continue;
        }

        const pctDaily = record.pctDaily;
        if (pctDaily === null || Math.abs(pctDaily) < subscription.minPercentChange) continue;

        for (const subscriber of subscribersOf(subscription)) {
            events.push({
                commodityName: record.commodityName,
                category: record.assetCategory,
                unit: record.unit,
                price: record.price,
                pctDaily,
                pctWeekly: record.pctWeekly,
                quoteDate: record.quoteDate,
                threshold: subscription.minPercentChange,
                subscriber,
            });
        }
    }

    return events;
}

export class AlertService {
    constructor(private readonly channels: ChannelRegistry) {}

    async dispatch(events: readonly AlertEvent[]): Promise<AlertDispatchSummary> {
        const summary: AlertDispatchSummary = { matched: events.length, sent: 0, failed: 0, skipped: 0 };

        for (const event of events) {
            const channel = this.channels[event.subscriber.channel];
            if (!channel) {
                console.warn(`[Alerts] No ${event.subscriber.channel} channel configured - ${event.commodityName} alert dropped`);
                summary.skipped += 1;
                continue;
            }

            const ok = await channel.send(event).catch((error: unknown) => {
                console.error(`[Alerts] ${channel.kind} channel threw for ${event.commodityName}:`, error);
                return false;
            });
            if (ok) summary.sent += 1;
            else summary.failed += 1;
        }

        console.log(`[Alerts] ${summary.sent}/${summary.matched} alerts sent`);
        return summary;
    }
}
