import jwt, { JsonWebTokenError } from "jsonwebtoken";
import { z } from "zod";

const unsubscribeClaimsSchema = z.object({
  subscriberId: z.string().min(1),
  campaignId: z.string().min(1),
});

export type UnsubscribeClaims = z.infer<typeof unsubscribeClaimsSchema>;

/** HS256 JWT carrying the recipient and campaign. Unsubscribe links do not expire. */
export function createUnsubscribeToken(claims: UnsubscribeClaims, secret: string): string {
  return jwt.sign({ subscriberId: claims.subscriberId, campaignId: claims.campaignId }, secret, {
    algorithm: "HS256",
  });
}

/** Returns null for a token that is malformed, forged or missing its claims. */
export function verifyUnsubscribeToken(token: string, secret: string): UnsubscribeClaims | null {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, secret, { algorithms: ["HS256"] });
  } catch (error) {
    if (error instanceof JsonWebTokenError) {
      return null;
    }
    throw error;
  }

  const parsed = unsubscribeClaimsSchema.safeParse(decoded);
  return parsed.success ? parsed.data : null;
}
