import { z } from "zod";

export const recipientSchema = z.object({
  id: z.string().min(1, "Recipient id is required"),
  email: z.string().email("Invalid email format"),
  firstName: z.string().optional(),
  lastName: z.string().optional(),
  company: z.string().optional(),
  city: z.string().optional(),
  country: z.string().optional(),
  timezone: z.string().optional(),
  industry: z.string().optional(),
});

export const dispatchCampaignSchema = z.object({
  recipients: z.array(recipientSchema).min(1, "At least one recipient is required").max(10000),
});

export const previewTemplateSchema = z.object({
  subject: z.string(),
  html: z.string(),
  text: z.string().default(""),
  weightedSpintax: z.boolean().optional(),
  recipient: recipientSchema.optional(),
  seed: z.number().int().optional(),
});

export type DispatchCampaignInput = z.infer<typeof dispatchCampaignSchema>;
export type PreviewTemplateInput = z.infer<typeof previewTemplateSchema>;
