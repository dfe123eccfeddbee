import axios from 'axios';
import type { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { describe, it, expect, vi } from 'vitest';
import type { AlertEvent, Subscription } from '../../types';
import { AlertService, buildAlertEvents } from '../../services/notifications/alertService';
import { EmailChannel, SmsChannel, smsGatewayAddress } from '../../services/notifications/emailChannel';
import { alertEmailBody, alertSmsBody, alertSubject } from '../../services/notifications/format';
import type { MailTransport } from '../../services/notifications/smtp';
import type { NotificationChannel } from '../../services/notifications/types';
import { WebhookChannel, webhookPayload } from '../../services/notifications/webhookChannel';
import { RUN_DATE, makeQuote } from './helpers';

const gold = makeQuote({ commodityName: 'Gold', price: 2650.1, pctDaily: 1.5, pctWeekly: 2.0 });

const goldAlert = (channel: AlertEvent['subscriber']['channel'], address: string): AlertEvent => ({
    commodityName: 'Gold',
    category: 'Metals',
    unit: 'USD/t.oz',
    price: 2650.1,
    pctDaily: 1.5,
    pctWeekly: 2.0,
    quoteDate: RUN_DATE,
    threshold: 1.0,
    subscriber: { channel, address }
});

const fakeChannel = (kind: NotificationChannel['kind'], send: NotificationChannel['send']): NotificationChannel => ({
    kind,
    send
});

describe('buildAlertEvents', () => {
    const records = [
        gold,
        makeQuote({ commodityName: 'Silver', pctDaily: -0.5 }),
        makeQuote({ commodityName: 'Lithium', pctDaily: null })
    ];

    it('creates one event per configured channel when the daily move reaches the threshold', () => {
        const subscriptions: Subscription[] = [
            { commodityName: 'gold', minPercentChange: 1.0, email: 'alerts@example.com', webhookUrl: 'https://hooks.example.com/t' },
            { commodityName: 'Silver', minPercentChange: 0.5, email: 'alerts@example.com' },
            { commodityName: 'Lithium', minPercentChange: 0, email: 'alerts@example.com' },
            { commodityName: 'Platinum', minPercentChange: 1.0, email: 'alerts@example.com' }
        ];

        const events = buildAlertEvents(records, subscriptions);

        expect(events.map(e => `${e.commodityName}:${e.subscriber.channel}`)).toEqual([
            'Gold:email',
            'Gold:webhook',
            'Silver:email'
        ]);
        expect(events[0]).toEqual(goldAlert('email', 'alerts@example.com'));
    });

    it('ignores moves below the threshold', () => {
        const events = buildAlertEvents(records, [
            { commodityName: 'Gold', minPercentChange: 1.6, smsAddress: '5550100@vtext.com' }
        ]);
        expect(events).toEqual([]);
    });
});

describe('AlertService', () => {
    it('counts sent, failed and unroutable alerts without throwing', async () => {
        const email = fakeChannel('email', vi.fn(async () => true));
        const webhook = fakeChannel('webhook', vi.fn(async () => {
            throw new Error('boom');
        }));
        const service = new AlertService({ email, webhook });

        const summary = await service.dispatch([
            goldAlert('email', 'alerts@example.com'),
            goldAlert('webhook', 'https://hooks.example.com/t'),
            goldAlert('sms', '5550100@vtext.com')
        ]);

        expect(summary).toEqual({ matched: 3, sent: 1, failed: 1, skipped: 1 });
    });
});

describe('mail channels', () => {
    it('emails the alert to the subscriber', async () => {
        const sendMail = vi.fn(async () => ({ messageId: 'test' }));
        const transport: MailTransport = { sendMail };
        const channel = new EmailChannel(transport, 'alerts@example.com');

        await expect(channel.send(goldAlert('email', 'trader@example.com'))).resolves.toBe(true);
        expect(sendMail).toHaveBeenCalledWith({
            from: 'alerts@example.com',
            to: 'trader@example.com',
            subject: 'Price Alert: Gold - +1.50%',
            text: alertEmailBody(goldAlert('email', 'trader@example.com'))
        });
    });

    it('reports a failed SMTP hand-off as false', async () => {
        const transport: MailTransport = { sendMail: vi.fn(async () => Promise.reject(new Error('535 auth failed'))) };
        const channel = new SmsChannel(transport, 'alerts@example.com');

        await expect(channel.send(goldAlert('sms', '5550100@vtext.com'))).resolves.toBe(false);
        expect(console.error).toHaveBeenCalledWith('[Alerts] Error sending SMS to 5550100@vtext.com: 535 auth failed');
    });

    it('formats subject and SMS text', () => {
        const alert = goldAlert('sms', '5550100@vtext.com');
        expect(alertSubject(alert)).toBe('Price Alert: Gold - +1.50%');
        expect(alertSmsBody(alert)).toBe('Gold Alert: 2650.10 D:+1.50% W:+2.00%');
        expect(alertEmailBody(alert)).toContain('Price: 2650.10 USD/t.oz');
    });

    it('builds carrier gateway addresses', () => {
        expect(smsGatewayAddress('(555) 010-0199', 'Verizon')).toBe('5550100199@vtext.com');
        expect(smsGatewayAddress('5550100199', 'unknown')).toBeNull();
    });
});

describe('WebhookChannel', () => {
    it('posts an embed to the subscriber URL', async () => {
        const adapter = vi.fn(async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => ({
            data: '',
            status: 204,
            statusText: 'No Content',
            headers: {},
            config
        }));
        const channel = new WebhookChannel(axios.create({ adapter }));

        await expect(channel.send(goldAlert('webhook', 'https://hooks.example.com/t'))).resolves.toBe(true);

        const request = adapter.mock.calls[0][0];
        expect(request.url).toBe('https://hooks.example.com/t');
        expect(request.method).toBe('post');
        const body: unknown = JSON.parse(String(request.data));
        expect(body).toMatchObject({ content: 'Price Alert: Gold - +1.50%', embeds: [{ title: 'Gold (Metals)', color: 0x22c55e }] });
    });

    it('colours falling prices red', () => {
        const payload = webhookPayload({ ...goldAlert('webhook', 'https://hooks.example.com/t'), pctDaily: -2 }, new Date(Date.UTC(2025, 10, 28)));
        expect(payload.embeds[0].color).toBe(0xef4444);
        expect(payload.embeds[0].timestamp).toBe('2025-11-28T00:00:00.000Z');
        expect(payload.embeds[0].fields[1]).toEqual({ name: 'Daily', value: '-2.00%', inline: true });
    });
});
