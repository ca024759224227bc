import { z } from 'zod';

// Shape a provider must resolve with; anything else counts as a failed load
export const cardDetailsSchema = z.object({
  cardNumber: z.string().min(4),
  cardHolder: z.string(),
  expiry: z.string().min(1),
  cvv: z.string().min(1),
});

export type CardDetailsPayload = z.infer<typeof cardDetailsSchema>;
