/**
 * Error classifier.
 *
 * The only place that interprets transport and device failures. Everything
 * above it sees one of four kinds plus a recovery action.
 */

import {
  ConnectionError,
  MalformedResponseError,
  SihasError,
  errnoCode,
  type ErrorKind,
} from "./errors.js";

export type FailureKind = Extract<ErrorKind, "Timeout" | "FeatureDisabled" | "MalformedResponse" | "UnknownProfile">;

export type RecoveryAction = "retry" | "surface-to-user" | "abort-setup";

export interface Classification {
  kind: FailureKind;
  action: RecoveryAction;
  /** Whether the next poll cycle may succeed without user intervention */
  recoverable: boolean;
  message: string;
}

const ACTIONS: Record<FailureKind, RecoveryAction> = {
  Timeout: "retry",
  MalformedResponse: "retry",
  FeatureDisabled: "surface-to-user",
  UnknownProfile: "abort-setup",
};

/** Node system error codes that mean the device did not answer. */
const UNREACHABLE_CODES = new Set([
  "ETIMEDOUT",
  "ECONNREFUSED",
  "ECONNRESET",
  "ECONNABORTED",
  "EHOSTUNREACH",
  "EHOSTDOWN",
  "ENETUNREACH",
  "ENETDOWN",
  "EPIPE",
  "EAI_AGAIN",
  "ENOTFOUND",
]);

function failureKindOf(err: unknown): FailureKind {
  if (err instanceof SihasError) {
    switch (err.kind) {
      case "Timeout":
      case "FeatureDisabled":
      case "MalformedResponse":
      case "UnknownProfile":
        return err.kind;
      // Command-side kinds never reach the wire; treat them as a bad exchange.
      case "NotWritable":
      case "ValidationError":
        return "MalformedResponse";
    }
  }
  const code = errnoCode(err);
  if (code !== undefined && UNREACHABLE_CODES.has(code)) {
    return "Timeout";
  }
  return "MalformedResponse";
}

function messageOf(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function classify(err: unknown): Classification {
  const kind = failureKindOf(err);
  return {
    kind,
    action: ACTIONS[kind],
    recoverable: kind === "Timeout" || kind === "MalformedResponse",
    message: messageOf(err),
  };
}

/**
 * Turn anything thrown by an exchange into a typed {@link SihasError}.
 * Library errors pass through unchanged.
 */
export function toDeviceError(err: unknown): SihasError {
  if (err instanceof SihasError) return err;
  const code = errnoCode(err);
  if (code !== undefined && UNREACHABLE_CODES.has(code)) {
    return new ConnectionError(messageOf(err), { code, cause: err });
  }
  return new MalformedResponseError(messageOf(err), { cause: err });
}
