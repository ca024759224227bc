import { z } from 'zod';
import { CardIntent } from '@/contracts';

export const cardIntentSchema = z.object({
  intent: z.nativeEnum(CardIntent),
  wait: z.boolean().optional(),
});

export type CardIntentInput = z.infer<typeof cardIntentSchema>;
