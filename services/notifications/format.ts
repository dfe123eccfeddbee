import type { AlertEvent } from '../../types';

export const signedPercent = (value: number): string =>
    `${value > 0 ? '+' : ''}${value.toFixed(2)}%`;

export const alertSubject = (alert: AlertEvent): string =>
    `Price Alert: ${alert.commodityName} - ${signedPercent(alert.pctDaily)}`;

export function alertEmailBody(alert: AlertEvent): string {
    const weekly = alert.pctWeekly === null ? 'n/a' : signedPercent(alert.pctWeekly);
    return [
        'Commodity Price Alert',
        '=====================',
        '',
        `Commodity: ${alert.commodityName}`,
        `Category: ${alert.category}`,
        '',
        `Price: ${alert.price.toFixed(2)} ${alert.unit}`.trimEnd(),
        '',
        'Performance:',
        `- Daily: ${signedPercent(alert.pctDaily)}`,
        `- Weekly: ${weekly}`,
        '',
        `Alert threshold: ${alert.threshold.toFixed(2)}%`,
        `Date: ${alert.quoteDate}`,
    ].join('\n');
}

/** Kept short for carrier gateways (160 characters). */
export function alertSmsBody(alert: AlertEvent): string {
    const weekly = alert.pctWeekly === null ? '' : ` W:${signedPercent(alert.pctWeekly)}`;
    return `${alert.commodityName} Alert: ${alert.price.toFixed(2)} D:${signedPercent(alert.pctDaily)}${weekly}`.slice(0, 160);
}
