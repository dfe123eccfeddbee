import type { AlertEvent, ChannelKind } from '../../types';

/**
 * A delivery channel. Resolves `true` when the alert was handed off,
 * `false` when delivery failed; channels do not throw.
 */
export interface NotificationChannel {
  readonly kind: ChannelKind;
  send(alert: AlertEvent): Promise<boolean>;
}

export type ChannelRegistry = Partial<Record<ChannelKind, NotificationChannel>>;
