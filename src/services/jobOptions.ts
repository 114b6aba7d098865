import { z } from 'zod';
import type { ReplayJobOptions } from '../types/job';
import { httpErrors } from '../middleware/errorHandler';

const booleanField = z.enum(['true', 'false']).transform(value => value === 'true');

/**
 * Multipart form fields accepted next to the uploaded file. All arrive as strings.
 */
export const replayFormSchema = z.object({
  loop: booleanField.optional(),
  maxCycles: z.coerce.number().int().min(0).optional(),
  arrayStrategy: z.enum(['grouped', 'pointer']).optional(),
  sampleSize: z.coerce.number().int().min(0).max(1000).optional(),
});

/**
 * Validate form fields and fill in defaults.
 * Looping without a cycle limit would never finish, so it is refused.
 */
export function parseJobOptions(body: unknown, defaults: ReplayJobOptions): ReplayJobOptions {
  const form = replayFormSchema.parse(body ?? {});
  const options: ReplayJobOptions = {
    loop: form.loop ?? defaults.loop,
    maxCycles: form.maxCycles ?? defaults.maxCycles,
    arrayStrategy: form.arrayStrategy ?? defaults.arrayStrategy,
    sampleSize: form.sampleSize ?? defaults.sampleSize,
  };

  if (options.loop && options.maxCycles === 0) {
    throw httpErrors.badRequest('maxCycles must be greater than 0 when loop is enabled');
  }

  return options;
}

/**
 * Uploader metadata: `name`, `email` and any `meta_*` form field
 */
export function extractMetadata(body: unknown): Record<string, string> {
  const metadata: Record<string, string> = {};
  if (typeof body !== 'object' || body === null) {
    return metadata;
  }

  for (const [key, value] of Object.entries(body)) {
    if (typeof value !== 'string') {
      continue;
    }
    if (key === 'name' || key === 'email') {
      metadata[key] = value;
    } else if (key.startsWith('meta_')) {
      metadata[key.slice('meta_'.length)] = value;
    }
  }

  return metadata;
}
