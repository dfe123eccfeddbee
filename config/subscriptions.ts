import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import type { Subscription } from '../types';
import { smsGatewayAddress } from '../services/notifications/emailChannel';
import { AnalysisError, errorMessage } from '../services/utils/errors';
import { ANALYSIS } from './analysisConfig';

// A phone number plus carrier is resolved to the carrier's email-to-SMS gateway
const PhoneSchema = z.object({
  phoneNumber: z.string().trim().min(1),
  carrier: z.string().trim().min(1),
});

const SubscriptionSchema = z
  .object({
    commodityName: z.string().trim().min(1),
    minPercentChange: z.number().nonnegative().default(ANALYSIS.ALERTS.DEFAULT_MIN_PERCENT_CHANGE),
    email: z.string().email().optional(),
    smsAddress: z.string().email().optional(),
    sms: PhoneSchema.optional(),
    webhookUrl: z.string().url().optional(),
  })
  .refine(s => Boolean(s.email || s.smsAddress || s.sms || s.webhookUrl), {
    message: 'needs at least one of email, smsAddress, sms or webhookUrl',
  })
  .transform(({ sms, ...subscription }, ctx): Subscription => {
    if (!sms || subscription.smsAddress) return subscription;
    const smsAddress = smsGatewayAddress(sms.phoneNumber, sms.carrier);
    if (!smsAddress) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sms'],
        message: `no SMS gateway for carrier "${sms.carrier}"`,
      });
      return z.NEVER;
    }
    return { ...subscription, smsAddress };
  });

const SubscriptionFileSchema = z.object({
  subscriptions: z.array(SubscriptionSchema),
});

export const DEFAULT_SUBSCRIPTIONS_PATH = path.join(process.cwd(), 'config', 'subscriptions.json');

export function parseSubscriptions(data: unknown): Subscription[] {
  const parsed = SubscriptionFileSchema.safeParse(data);
  if (!parsed.success) {
    const details = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new AnalysisError('CONFIG_INVALID', `Invalid subscriptions: ${details}`, { cause: parsed.error });
  }
  return parsed.data.subscriptions;
}

export async function loadSubscriptions(filePath: string = DEFAULT_SUBSCRIPTIONS_PATH): Promise<Subscription[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new AnalysisError('CONFIG_INVALID', `Cannot read subscriptions from ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new AnalysisError('CONFIG_INVALID', `${filePath} is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }

  const subscriptions = parseSubscriptions(data);
  console.log(`[Config] Loaded ${subscriptions.length} alert subscriptions`);
  return subscriptions;
}
