// Request body validation for POST /api/generate

import { z } from 'zod';

const ShortText = z.string().trim().max(500);
const LongText = z.string().trim().max(5_000);
const TextList = z.array(z.string().trim().min(1).max(200)).max(20).default([]);

export const B2BProfileSchema = z.object({
  targetCompanySizes: TextList,
  targetIndustries: TextList,
  dealSizeRange: ShortText.optional(),
  salesCycleLength: ShortText.optional(),
  decisionMakerRoles: TextList,
  painPoints: TextList,
});

export const B2CProfileSchema = z.object({
  targetAgeGroups: TextList,
  incomeBrackets: TextList,
  productCategory: ShortText.optional(),
  purchaseFrequency: ShortText.optional(),
  customerMotivations: TextList,
});

export const BusinessInputSchema = z.object({
  companyName: ShortText.optional(),
  industry: ShortText.default(''),
  businessModel: z.enum(['B2B', 'B2C', 'Both']),
  description: LongText.optional(),
  targetDescription: LongText.optional(),
  geography: TextList,
  knownCompetitors: TextList,
  b2b: B2BProfileSchema.optional(),
  b2c: B2CProfileSchema.optional(),
});

export const DocumentContextSchema = z.object({
  text: z.string().max(500_000),
  fileNames: z.array(z.string()).default([]),
  stats: z
    .object({
      fileCount: z.number().int().min(0),
      totalChars: z.number().int().min(0),
      dataPoints: z.number().int().min(0),
    })
    .optional(),
});

export const GenerateRequestSchema = z.object({
  businessInput: BusinessInputSchema,
  documentContext: DocumentContextSchema.optional(),
});

export type GenerateRequest = z.infer<typeof GenerateRequestSchema>;

