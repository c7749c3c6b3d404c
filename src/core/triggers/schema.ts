import { z } from 'zod';
import { VARIANT_KINDS } from './types.js';

const RuleBaseSchema = z.object({
  chatId: z.string(),
  name: z.string().min(1),
  sourceWord: z.string().min(1),
  enabled: z.boolean(),
  createdBy: z.string(),
  createdAt: z.number(),
});

export const TriggerRuleSchema = z.discriminatedUnion('kind', [
  RuleBaseSchema.extend({ kind: z.literal('LEMMA') }),
  RuleBaseSchema.extend({
    kind: z.literal('PATTERN'),
    variant: z.enum(VARIANT_KINDS),
    pattern: z.string().min(1),
  }),
]);

/** On-disk shape of one chat's rule file */
export const RuleFileSchema = z.object({
  chatId: z.string(),
  rules: z.array(TriggerRuleSchema),
});
