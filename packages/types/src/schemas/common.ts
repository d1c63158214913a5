/**
 * Common schemas shared by the analytics models
 */
import { z } from 'zod';

/**
 * Item code as it appears in the item master
 */
export const ItemCodeSchema = z.string().min(1).max(140).describe('Item master code');

/**
 * Non-negative finite quantity, value or day count
 */
export const NonNegativeNumberSchema = z
  .number()
  .finite('Must be a finite number')
  .min(0, 'Must not be negative');

/**
 * Confidence on the 0-100 scale used by classification results
 */
export const ConfidenceSchema = z.number().int().min(0).max(100);

/**
 * Action priority (1 = informational, 10 = act now)
 */
export const ActionPrioritySchema = z.number().int().min(1).max(10);

/**
 * ISO 8601 timestamp
 */
export const TimestampSchema = z.coerce.date().describe('ISO 8601 timestamp');

/**
 * Age-based lifecycle phase shared by the item classifier and the health scorer
 */
export const LifeStageSchema = z.enum(['LAUNCH', 'LEARNING', 'GRADUATION', 'ESTABLISHED']);

/**
 * Failure recorded for one item of a batch
 */
export const ItemFailureSchema = z.object({
  itemCode: z.string(),
  code: z.string(),
  message: z.string(),
});

export type ItemCode = z.infer<typeof ItemCodeSchema>;
export type Confidence = z.infer<typeof ConfidenceSchema>;
export type ActionPriority = z.infer<typeof ActionPrioritySchema>;
export type LifeStage = z.infer<typeof LifeStageSchema>;
export type ItemFailure = z.infer<typeof ItemFailureSchema>;
