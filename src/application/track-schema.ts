import { z } from 'zod';

/**
 * Zod schema for a tracking request body.
 *
 * Trackers post either one event object or a non-empty array of them.
 * Event contents stay open-ended: the collector relays them untouched and
 * leaves schema validation to downstream enrichment.
 */
export const trackEventSchema = z.record(z.string(), z.unknown());

export const trackBodySchema = z.union([
  trackEventSchema,
  z.array(trackEventSchema).min(1, 'Batch must contain at least one event'),
]);

/** Query-string tracking (pixel requests): flat string parameters. */
export const trackQuerySchema = z.record(z.string(), z.union([z.string(), z.array(z.string())]));
