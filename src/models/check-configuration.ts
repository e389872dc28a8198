import { z } from 'zod';
import { VersionCheckError } from '../utils/errors';

export const checkConfigurationSchema = z.object({
  /** Overrides the bundle identifier used for the App Store lookup */
  appleStoreId: z.string().trim().min(1, 'Apple store id must not be empty.').optional(),
  /** Overrides the application id used for the Play Store page */
  playStoreId: z.string().trim().min(1, 'Play store id must not be empty.').optional(),
  /** Two-letter ISO 3166-1 country of the App Store to search */
  appleStoreCountry: z
    .string()
    .trim()
    .regex(/^[A-Za-z]{2}$/, 'Apple store country must be a two-letter country code.')
    .optional(),
  /** `hl` parameter of the Play Store page */
  playLocale: z.string().trim().min(1, 'Play locale must not be empty.').optional(),
  /** Replaces the store's version field, for trying out the prompt before a release */
  forcedStoreVersion: z.string().optional(),
  preferNewerLocalShowsChangelog: z.boolean(),
});

export type CheckConfiguration = z.infer<typeof checkConfigurationSchema>;

export function parseCheckConfiguration(input: unknown): CheckConfiguration {
  const result = checkConfigurationSchema.safeParse(input);
  if (!result.success) {
    const message = result.error.issues.map((issue) => issue.message).join(' ');
    throw new VersionCheckError('INVALID_CONFIGURATION', message, result.error.issues);
  }
  return result.data;
}
