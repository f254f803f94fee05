/**
 * Date partition resolution for scheduled and manual runs.
 *
 * Scheduled runs fire on Mondays (UTC) and report on the week that started
 * two Mondays earlier. Manual runs on other days look back exactly 14 days
 * unless the event pins a date.
 */

import { z } from 'zod';
import { datePartitionSchema } from '../config/reportConfig';
import { ConfigurationError } from './errors';

const DAY_MS = 24 * 60 * 60 * 1000;
const DEFAULT_LOOKBACK_DAYS = 14;

const nullAsAbsent = (value: unknown): unknown => (value === null ? undefined : value);

/**
 * Manual-run overrides. `null` counts as absent; any `mode` other than
 * `weekly` is ignored.
 */
export const reportEventSchema = z
  .object({
    date_partition: z.preprocess(nullAsAbsent, datePartitionSchema.optional()),
    mode: z.preprocess(nullAsAbsent, z.string().optional()),
    days_ago: z.preprocess(nullAsAbsent, z.coerce.number().int().nonnegative().optional()),
  })
  .passthrough();

export const formatDatePartition = (date: Date): string => date.toISOString().slice(0, 10);

export function mondayTwoWeeksAgo(today: Date): string {
  const daysSinceMonday = (today.getUTCDay() + 6) % 7;
  return formatDatePartition(new Date(today.getTime() - (daysSinceMonday + 14) * DAY_MS));
}

export function exactDaysAgo(today: Date, days = DEFAULT_LOOKBACK_DAYS): string {
  return formatDatePartition(new Date(today.getTime() - days * DAY_MS));
}

/**
 * Pick the date partition for this run.
 *
 * Precedence: test override (only when supplied), explicit `date_partition`,
 * `mode: "weekly"`, `days_ago`, then the Monday/other-day default.
 *
 * @throws ConfigurationError when the event carries malformed overrides
 */
export function resolveDatePartition(
  rawEvent: unknown,
  now: Date,
  testOverride?: string
): string {
  if (testOverride) {
    return testOverride;
  }

  const parsed = reportEventSchema.safeParse(rawEvent ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `event.${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const event = parsed.data;
  if (event.date_partition) {
    return event.date_partition;
  }
  if (event.mode === 'weekly') {
    return mondayTwoWeeksAgo(now);
  }
  if (event.days_ago !== undefined) {
    return exactDaysAgo(now, event.days_ago);
  }

  return now.getUTCDay() === 1 ? mondayTwoWeeksAgo(now) : exactDaysAgo(now);
}
