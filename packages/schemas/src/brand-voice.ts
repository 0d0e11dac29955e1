import { z } from 'zod';

export const brandVoiceSchema = z.object({
  name: z.string().min(1),
  tone: z.array(z.string().min(1)).default([]),
  mission: z.string().default(''),
  vision: z.string().default(''),
  pillars: z.array(z.string().min(1)).default([]),
  signature: z.string().optional(),
});

export type BrandVoice = z.infer<typeof brandVoiceSchema>;
export type BrandVoiceInput = z.input<typeof brandVoiceSchema>;
