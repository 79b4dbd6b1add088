import { z } from 'zod';

const positiveInt = z.number().int().positive();

export const segmentSchema = z.object({
  id: z.string().min(1, 'Segment id cannot be empty'),
  groupKey: z.string().min(1, 'Segment groupKey cannot be empty'),
  text: z.string(),
  start: z.number().nonnegative(),
  end: z.number().nonnegative(),
  metadata: z.record(z.unknown()).default({}),
}).refine((segment) => segment.end >= segment.start, {
  message: 'Segment end must not be before its start',
  path: ['end'],
});

export const segmentListSchema = z.array(segmentSchema);

export const indexSegmentsSchema = z.object({
  segments: segmentListSchema.min(1, 'At least one segment is required'),
  window: positiveInt.optional(),
  stride: positiveInt.optional(),
  dropExisting: z.boolean().optional(),
});

export const searchChunksSchema = z.object({
  query: z.string().trim().min(1, 'Query cannot be empty'),
  limit: z.number().int().min(1).max(100).optional(),
});
