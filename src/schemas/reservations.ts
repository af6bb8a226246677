import { z } from "zod";
import { isValidHostname } from "../utils/net.ts";
import { ipv4, macAddress } from "./common.ts";

export const addReservation = z.object({
  macAddress,
  ipAddress: ipv4,
  hostname: z
    .string()
    .trim()
    .refine((value) => value === "" || isValidHostname(value), { message: "Invalid hostname" })
    .optional(),
});

export type AddReservation = z.infer<typeof addReservation>;
