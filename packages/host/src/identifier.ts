/**
 * Identifier validation (client, connection, channel and port IDs)
 */

import { z } from "zod";
import { IDENTIFIER_BOUNDS, IDENTIFIER_CHARS_REGEX } from "./constants.ts";
import type { HostValidationResult, IdentifierKind } from "./types.ts";

function identifierSchema(kind: IdentifierKind) {
  const [min, max] = IDENTIFIER_BOUNDS[kind];
  return z
    .string()
    .min(min, `must be at least ${min} characters`)
    .max(max, `must be at most ${max} characters`)
    .regex(/^[^/]*$/, "cannot contain separator '/'")
    .regex(
      IDENTIFIER_CHARS_REGEX,
      "must contain only alphanumeric or the following characters: '.', '_', '+', '-', '#', '[', ']', '<', '>'"
    );
}

const SCHEMAS = {
  default: identifierSchema("default"),
  client: identifierSchema("client"),
  connection: identifierSchema("connection"),
  channel: identifierSchema("channel"),
  port: identifierSchema("port"),
} as const;

/**
 * Validate an identifier against the bounds of its kind.
 *
 * @example
 * ```ts
 * validateIdentifier("connection-0", "connection") // => { ok: true }
 * validateIdentifier("conn", "connection")
 * // => { ok: false, code: "INVALID_IDENTIFIER", message: 'connection identifier "conn" must be at least 10 characters' }
 * ```
 */
export function validateIdentifier(
  id: string,
  kind: IdentifierKind = "default"
): HostValidationResult {
  const result = SCHEMAS[kind].safeParse(id);
  if (result.success) {
    return { ok: true };
  }
  const reason = result.error.issues[0]?.message ?? "is invalid";
  return {
    ok: false,
    code: "INVALID_IDENTIFIER",
    message: `${kind} identifier "${id}" ${reason}`,
  };
}

export const validateClientId = (id: string): HostValidationResult =>
  validateIdentifier(id, "client");

export const validateConnectionId = (id: string): HostValidationResult =>
  validateIdentifier(id, "connection");

export const validateChannelId = (id: string): HostValidationResult =>
  validateIdentifier(id, "channel");

export const validatePortId = (id: string): HostValidationResult =>
  validateIdentifier(id, "port");
