/**
 * @fileoverview On-disk session format.
 *
 * Timestamps are ISO 8601 strings on disk and Unix ms in memory.
 */

import { z } from 'zod';
import type { SessionSnapshot } from '@price-sentinel/contracts';

const isoTimestamp = z.string().datetime({ offset: true });

export const sessionPointSchema = z.object({
  timestamp: isoTimestamp,
  price: z.number().finite().positive(),
});

export const sessionFileSchema = z
  .object({
    ticker: z.string().min(1),
    prices: z.array(sessionPointSchema),
    last_alert_time: isoTimestamp.nullable(),
    checkpoint_sequence_number: z.number().int().nonnegative(),
  })
  .superRefine((file, ctx) => {
    for (let i = 1; i < file.prices.length; i++) {
      const previous = file.prices[i - 1];
      const current = file.prices[i];
      if (previous !== undefined && current !== undefined && Date.parse(current.timestamp) <= Date.parse(previous.timestamp)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['prices', i, 'timestamp'],
          message: 'Timestamps must be strictly increasing',
        });
        return;
      }
    }
  });

export type SessionFile = z.infer<typeof sessionFileSchema>;

export function toSessionFile(snapshot: SessionSnapshot): SessionFile {
  return {
    ticker: snapshot.ticker,
    prices: snapshot.prices.map((point) => ({
      timestamp: new Date(point.timestamp).toISOString(),
      price: point.price,
    })),
    last_alert_time: snapshot.lastAlertTime === null ? null : new Date(snapshot.lastAlertTime).toISOString(),
    checkpoint_sequence_number: snapshot.checkpointSequenceNumber,
  };
}

export function fromSessionFile(file: SessionFile): SessionSnapshot {
  return {
    ticker: file.ticker,
    prices: file.prices.map((point) => ({
      timestamp: Date.parse(point.timestamp),
      price: point.price,
    })),
    lastAlertTime: file.last_alert_time === null ? null : Date.parse(file.last_alert_time),
    checkpointSequenceNumber: file.checkpoint_sequence_number,
  };
}
