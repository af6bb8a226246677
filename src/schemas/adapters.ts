import { z } from "zod";
import { ipv4 } from "./common.ts";

export const configureAdapter = z.object({
  ipAddress: ipv4,
  prefix: z.number().int().min(1).max(32).default(24),
});

export type ConfigureAdapter = z.infer<typeof configureAdapter>;
