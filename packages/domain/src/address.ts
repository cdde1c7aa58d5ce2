import { z } from 'zod';

const WHITESPACE_PATTERN = /[\s　]+/g;

/**
 * Postal address in the shape the Address Validation API accepts.
 */
export const PostalAddressSchema = z.object({
  regionCode: z.string().length(2).optional(),
  languageCode: z.string().min(2).optional(),
  postalCode: z.string().optional(),
  administrativeArea: z.string().optional(),
  locality: z.string().optional(),
  sublocality: z.string().optional(),
  addressLines: z.array(z.string().min(1)).min(1).max(5),
  recipients: z.array(z.string()).optional(),
  organization: z.string().optional()
});

export type PostalAddress = z.infer<typeof PostalAddressSchema>;

export function normalizeAddress(input: string): string {
  return input.replace(WHITESPACE_PATTERN, ' ').trim();
}
