/**
 * Device setup record validation.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { DEFAULT_PORT } from "./frame.js";
import { DEFAULT_FAILURE_THRESHOLD } from "./poller.js";

export const DEFAULT_POLL_INTERVAL_SECONDS = 5;
export const DEFAULT_TIMEOUT_MS = 1000;

/** Drop leading zeros from each part of a dotted-quad address ("192.168.001.020" → "192.168.1.20"). */
export function normalizeHost(host: string): string {
  const trimmed = host.trim();
  if (!/^\d{1,3}(\.\d{1,3}){3}$/.test(trimmed)) return trimmed;
  return trimmed
    .split(".")
    .map((part) => String(parseInt(part, 10)))
    .join(".");
}

/** Lower-case colon form of a 12-hex-digit MAC, or null when it is not one. */
export function normalizeMac(mac: string): string | null {
  const hex = mac.trim().replace(/[:\-.]/g, "").toLowerCase();
  if (!/^[0-9a-f]{12}$/.test(hex)) return null;
  return hex.match(/.{2}/g)?.join(":") ?? null;
}

export const deviceSetupSchema = z.object({
  host: z
    .string()
    .trim()
    .min(1, "host is required")
    .transform(normalizeHost),
  mac: z
    .string()
    .transform((value, ctx) => {
      const mac = normalizeMac(value);
      if (mac === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a MAC address` });
        return z.NEVER;
      }
      return mac;
    })
    .optional(),
  deviceType: z
    .string()
    .trim()
    .min(1, "deviceType is required")
    .transform((value) => value.toUpperCase()),
  configCode: z.number().int().nonnegative(),
  port: z.number().int().min(1).max(65535).default(DEFAULT_PORT),
  pollIntervalSeconds: z.number().min(1).max(3600).default(DEFAULT_POLL_INTERVAL_SECONDS),
  timeoutMs: z.number().int().min(100).max(30000).default(DEFAULT_TIMEOUT_MS),
  failureThreshold: z.number().int().min(1).max(100).default(DEFAULT_FAILURE_THRESHOLD),
});

/** Setup record as supplied by the caller. */
export type DeviceSetupInput = z.input<typeof deviceSetupSchema>;
/** Setup record after defaults and normalisation. */
export type DeviceSetup = z.output<typeof deviceSetupSchema>;

/**
 * Validate a device setup record.
 *
 * @throws ConfigurationError listing every problem found
 */
export function parseDeviceSetup(input: unknown): DeviceSetup {
  const result = deviceSetupSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }
  return result.data;
}
