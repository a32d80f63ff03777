import { z } from "zod";

export const bounceWebhookSchema = z
  .object({
    trackingId: z.string().min(1).optional(),
    messageId: z.string().min(1).optional(),
    bounceType: z.enum(["hard", "soft"]),
    reason: z.string().min(1, "Bounce reason is required").max(2000),
  })
  .refine((body) => Boolean(body.trackingId || body.messageId), {
    message: "Either trackingId or messageId is required",
    path: ["trackingId"],
  });

export type BounceWebhookInput = z.infer<typeof bounceWebhookSchema>;
