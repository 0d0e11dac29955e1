import { z } from 'zod';
import { confidenceEnum } from './enums';
import { fieldSchema } from './field';

export const httpUrlSchema = z
  .string()
  .url()
  .refine((u) => /^https?:\/\//i.test(u), { message: 'Expected an http(s) URL' });

export const rawContactSchema = z.object({
  id: z.string().trim().min(1).optional(),
  name: z.string().trim().min(1, 'Contact name is required'),
  outlet: z.string().trim().min(1).optional(),
  profileUrl: httpUrlSchema.optional(),
  email: z.string().trim().email().optional(),
  keywords: z.array(z.string().trim().min(1)).default([]),
});

export type RawContact = z.infer<typeof rawContactSchema>;
export type RawContactInput = z.input<typeof rawContactSchema>;

export const citationSchema = z.object({
  url: httpUrlSchema,
  description: z.string(),
  supports: z.array(z.string()).default([]),
});

export type Citation = z.infer<typeof citationSchema>;

const stringField = fieldSchema(z.string().min(1));

export const prospectSchema = z.object({
  itemId: z.string().min(1),
  name: z.string().min(1),
  matchedName: stringField,
  outlet: stringField,
  beat: stringField,
  profileUrl: fieldSchema(httpUrlSchema),
  email: stringField,
  keywords: z.array(z.string()),
  confidence: z.object({
    outlet: confidenceEnum,
    beat: confidenceEnum,
    profileUrl: confidenceEnum,
    email: confidenceEnum,
  }),
  citations: z.array(citationSchema),
});

export type Prospect = z.infer<typeof prospectSchema>;
export type ProspectConfidence = Prospect['confidence'];
