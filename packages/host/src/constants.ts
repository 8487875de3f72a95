/**
 * Store path grammar constants
 */

/**
 * Characters allowed in identifiers (client, connection, channel, port IDs).
 * Allowed: alphanumeric, ., _, +, -, #, [, ], <, >
 */
export const IDENTIFIER_CHARS_REGEX = /^[a-zA-Z0-9._+\-#[\]<>]+$/;

/**
 * Characters allowed in a rendered path segment.
 * Identifier characters plus `%` (percent escapes), `:` (hex segments) and `~`.
 */
export const PATH_SEGMENT_REGEX = /^[a-zA-Z0-9._+\-#[\]<>%:~]+$/;

/** Path separator between segments and between key-path levels */
export const PATH_SEPARATOR = "/";

export const MAX_PATH_SEGMENT_LENGTH = 128;

/**
 * Length bounds per identifier kind, `[min, max]` inclusive.
 */
export const IDENTIFIER_BOUNDS = {
  default: [1, 64],
  client: [9, 64],
  connection: [10, 64],
  channel: [8, 64],
  port: [2, 128],
} as const;

/**
 * Well-known store key segments
 */
export const KEY_CLIENTS = "clients";
export const KEY_CLIENT_STATE = "clientState";
export const KEY_CONSENSUS_STATES = "consensusStates";
export const KEY_CONNECTIONS = "connections";
export const KEY_CHANNEL_ENDS = "channelEnds";
export const KEY_PORTS = "ports";
export const KEY_CHANNELS = "channels";
export const KEY_SEQUENCES = "sequences";
export const KEY_PACKET_COMMITMENTS = "commitments";
export const KEY_PACKET_ACKS = "acks";
export const KEY_NEXT_SEQUENCE_RECV = "nextSequenceRecv";
