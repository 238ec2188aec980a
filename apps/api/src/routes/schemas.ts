/**
 * Request Schemas (Zod)
 */

import { z } from "zod";
import { TTL_CONFIG, isHttpUrl } from "@linkvault/shared";

export const createLinkBodySchema = z.object({
  longUrl: z
    .string({ required_error: "Long URL is required" })
    .trim()
    .min(1, "Long URL is required")
    .max(2048, "URL too long (max 2048 characters)")
    .refine(isHttpUrl, "Invalid URL format"),
  customId: z
    .string()
    .regex(/^[A-Za-z0-9_-]*$/, "Custom ID can only contain letters, numbers, underscores, and hyphens")
    .nullish(),
});

export const createLinkQuerySchema = z.object({
  ttl: z.coerce
    .number({ invalid_type_error: "TTL must be a number of hours" })
    .int("TTL must be a whole number of hours")
    .positive("TTL must be a positive number of hours")
    .max(TTL_CONFIG.MAX_HOURS, `TTL must be at most ${TTL_CONFIG.MAX_HOURS} hours`)
    .optional(),
});

export const linkParamsSchema = z.object({
  id: z.string().min(1).max(64),
});

export type CreateLinkBody = z.infer<typeof createLinkBodySchema>;
export type CreateLinkQuery = z.infer<typeof createLinkQuerySchema>;
export type LinkParams = z.infer<typeof linkParamsSchema>;

/**
 * Flatten zod issues into a field -> first message map
 */
export function toFieldErrors(error: z.ZodError): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? issue.path.join(".") : "request";
    if (!(field in fields)) {
      fields[field] = issue.message;
    }
  }
  return fields;
}
