/**
 * Error types raised by the device engine.
 *
 * Every error carries a `kind` from a closed set so callers can branch on it
 * without string matching.
 */

export type ErrorKind =
  | "Timeout"
  | "FeatureDisabled"
  | "MalformedResponse"
  | "UnknownProfile"
  | "NotWritable"
  | "ValidationError";

export abstract class SihasError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ---------- Transport ----------

export class TransportTimeoutError extends SihasError {
  readonly kind = "Timeout" as const;
  readonly timeoutMs: number;

  constructor(host: string, timeoutMs: number) {
    super(`No response from ${host} within ${timeoutMs} ms`);
    this.timeoutMs = timeoutMs;
  }
}

/** Socket refused, reset or closed before a full response arrived. */
export class ConnectionError extends SihasError {
  readonly kind = "Timeout" as const;
  readonly code: string | undefined;

  constructor(message: string, options: { code?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.code = options.code;
  }
}

export class DeviceClosedError extends SihasError {
  readonly kind = "Timeout" as const;

  constructor(message = "Device connection was closed") {
    super(message);
  }
}

// ---------- Protocol ----------

export class FeatureDisabledError extends SihasError {
  readonly kind = "FeatureDisabled" as const;

  constructor(host?: string) {
    super(
      host
        ? `Remote control is disabled on ${host}; enable the HA/Modbus option in the SiHAS app`
        : "Remote control is disabled on the device; enable the HA/Modbus option in the SiHAS app"
    );
  }
}

export class MalformedResponseError extends SihasError {
  readonly kind = "MalformedResponse" as const;
}

// ---------- Profiles and commands ----------

export class UnknownProfileError extends SihasError {
  readonly kind = "UnknownProfile" as const;
  readonly deviceType: string;
  readonly configCode: number;

  constructor(deviceType: string, configCode: number) {
    super(`No register layout for device type ${deviceType} with config code ${configCode}`);
    this.deviceType = deviceType;
    this.configCode = configCode;
  }
}

export class NotWritableError extends SihasError {
  readonly kind = "NotWritable" as const;
  readonly channel: string;

  constructor(channel: string, reason = "is not writable") {
    super(`Channel "${channel}" ${reason}`);
    this.channel = channel;
  }
}

export class ValidationError extends SihasError {
  readonly kind = "ValidationError" as const;
}

/** Invalid device setup record. */
export class ConfigurationError extends SihasError {
  readonly kind = "ValidationError" as const;
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid device configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

/** The errno-style `code` of a Node system error, when present. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
