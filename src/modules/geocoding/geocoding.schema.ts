/**
 * =============================================================================
 * GEOCODING MODULE - SCHEMAS
 * =============================================================================
 */

import { z } from 'zod';
import { addressSchema, cityHintSchema } from '../../shared/utils/validation.utils';

export const resolveAddressSchema = z.object({
  address: addressSchema,
  cityHint: cityHintSchema,
}).strict();

export type ResolveAddressInput = z.infer<typeof resolveAddressSchema>;
