import { z } from "zod";
import { MAX_CHANNEL, MIN_CHANNEL, MIN_KEY_LENGTH } from "../services/access-point.ts";
import { ipv4 } from "./common.ts";

export const configureWifi = z.object({
  ssid: z.string().min(1).max(32),
  password: z.string().min(MIN_KEY_LENGTH).max(63),
  channel: z.number().int().min(MIN_CHANNEL).max(MAX_CHANNEL).default(6),
  ipAddress: ipv4.default("10.0.2.1"),
});

export type ConfigureWifi = z.infer<typeof configureWifi>;
