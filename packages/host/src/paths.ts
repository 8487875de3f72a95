/**
 * Well-known store paths.
 *
 * Each builder returns the ordered segment list for one key; feed it to
 * `newPath` from `@chainproof/commitment` to get a commitment path.
 */

import {
  KEY_CHANNEL_ENDS,
  KEY_CHANNELS,
  KEY_CLIENT_STATE,
  KEY_CLIENTS,
  KEY_CONNECTIONS,
  KEY_CONSENSUS_STATES,
  KEY_NEXT_SEQUENCE_RECV,
  KEY_PACKET_ACKS,
  KEY_PACKET_COMMITMENTS,
  KEY_PORTS,
  KEY_SEQUENCES,
} from "./constants.ts";
import type { Height } from "./types.ts";

/** `{revisionNumber}-{revisionHeight}` */
export function formatHeight(height: Height): string {
  return `${height.revisionNumber}-${height.revisionHeight}`;
}

/** clients/{clientId}/clientState */
export function clientStatePath(clientId: string): string[] {
  return [KEY_CLIENTS, clientId, KEY_CLIENT_STATE];
}

/** clients/{clientId}/consensusStates/{height} */
export function consensusStatePath(clientId: string, height: Height): string[] {
  return [KEY_CLIENTS, clientId, KEY_CONSENSUS_STATES, formatHeight(height)];
}

/** connections/{connectionId} */
export function connectionPath(connectionId: string): string[] {
  return [KEY_CONNECTIONS, connectionId];
}

function portChannel(portId: string, channelId: string): string[] {
  return [KEY_PORTS, portId, KEY_CHANNELS, channelId];
}

/** channelEnds/ports/{portId}/channels/{channelId} */
export function channelPath(portId: string, channelId: string): string[] {
  return [KEY_CHANNEL_ENDS, ...portChannel(portId, channelId)];
}

/** commitments/ports/{portId}/channels/{channelId}/sequences/{sequence} */
export function packetCommitmentPath(
  portId: string,
  channelId: string,
  sequence: number | bigint
): string[] {
  return [KEY_PACKET_COMMITMENTS, ...portChannel(portId, channelId), KEY_SEQUENCES, String(sequence)];
}

/** acks/ports/{portId}/channels/{channelId}/sequences/{sequence} */
export function packetAcknowledgementPath(
  portId: string,
  channelId: string,
  sequence: number | bigint
): string[] {
  return [KEY_PACKET_ACKS, ...portChannel(portId, channelId), KEY_SEQUENCES, String(sequence)];
}

/** nextSequenceRecv/ports/{portId}/channels/{channelId} */
export function nextSequenceRecvPath(portId: string, channelId: string): string[] {
  return [KEY_NEXT_SEQUENCE_RECV, ...portChannel(portId, channelId)];
}
