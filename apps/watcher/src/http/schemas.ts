import { z } from "zod";

// Chain account names: up to 12 characters from a-z, 1-5 and dot.
export const actorAccountSchema = z.string().regex(/^[a-z1-5.]{1,12}$/, "Invalid account name");

export const jwtClaimsSchema = z.object({
  sub: z.string().min(1)
});

export const deviceTokenBodySchema = z.object({
  deviceToken: z.string().trim().min(1).max(4096)
});
