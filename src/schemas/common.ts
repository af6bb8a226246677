import { z } from "zod";
import { isValidIPv4, isValidMac, normalizeMac } from "../utils/net.ts";

export const ipv4 = z.string().trim().refine(isValidIPv4, { message: "Invalid IPv4 address" });

/** Accepts any case; the parsed value is lowercase. */
export const macAddress = z
  .string()
  .transform(normalizeMac)
  .refine(isValidMac, { message: "Invalid MAC address format (expected aa:bb:cc:dd:ee:ff)" });

export const limitQuery = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(50),
});

export type LimitQuery = z.infer<typeof limitQuery>;
