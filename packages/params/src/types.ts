/**
 * QoS policy constants and shared types.
 */

import type { FieldViolation, QosLogger } from '@qos-policy/core';

// ─── DSCP ────────────────────────────────────────────────────────

/** The policy does not specify a DSCP value. */
export const DSCP_ANY = -1;
export const DSCP_MAX = 63;

// ─── Protocol ────────────────────────────────────────────────────

export const PROTOCOL_ANY = -1;
export const PROTOCOL_TCP = 6;
export const PROTOCOL_UDP = 17;
export const PROTOCOL_ESP = 50;

export const Protocol = {
  ANY: PROTOCOL_ANY,
  TCP: PROTOCOL_TCP,
  UDP: PROTOCOL_UDP,
  ESP: PROTOCOL_ESP,
} as const;

export type Protocol = (typeof Protocol)[keyof typeof Protocol];

// ─── Direction ───────────────────────────────────────────────────

/** Policy matches packets in the uplink direction. */
export const DIRECTION_UPLINK = 0;
/** Policy matches packets in the downlink direction. */
export const DIRECTION_DOWNLINK = 1;

export const Direction = {
  UPLINK: DIRECTION_UPLINK,
  DOWNLINK: DIRECTION_DOWNLINK,
} as const;

export type Direction = (typeof Direction)[keyof typeof Direction];

// ─── User Priority ───────────────────────────────────────────────

/** The policy does not specify a user priority. */
export const USER_PRIORITY_ANY = -1;
export const USER_PRIORITY_BEST_EFFORT_LOW = 0;
export const USER_PRIORITY_BACKGROUND_LOW = 1;
export const USER_PRIORITY_BACKGROUND_HIGH = 2;
export const USER_PRIORITY_BEST_EFFORT_HIGH = 3;
export const USER_PRIORITY_VIDEO_LOW = 4;
export const USER_PRIORITY_VIDEO_HIGH = 5;
export const USER_PRIORITY_VOICE_LOW = 6;
export const USER_PRIORITY_VOICE_HIGH = 7;

export const UserPriority = {
  ANY: USER_PRIORITY_ANY,
  BEST_EFFORT_LOW: USER_PRIORITY_BEST_EFFORT_LOW,
  BACKGROUND_LOW: USER_PRIORITY_BACKGROUND_LOW,
  BACKGROUND_HIGH: USER_PRIORITY_BACKGROUND_HIGH,
  BEST_EFFORT_HIGH: USER_PRIORITY_BEST_EFFORT_HIGH,
  VIDEO_LOW: USER_PRIORITY_VIDEO_LOW,
  VIDEO_HIGH: USER_PRIORITY_VIDEO_HIGH,
  VOICE_LOW: USER_PRIORITY_VOICE_LOW,
  VOICE_HIGH: USER_PRIORITY_VOICE_HIGH,
} as const;

export type UserPriority = (typeof UserPriority)[keyof typeof UserPriority];

// ─── Ports & IDs ─────────────────────────────────────────────────

/** The policy does not specify a source port. */
export const SOURCE_PORT_ANY = -1;
export const PORT_MAX = 65535;

export const POLICY_ID_MIN = 1;
export const POLICY_ID_MAX = 255;

/** Inclusive destination port range. */
export type PortRange = readonly [start: number, end: number];

// ─── Validation ──────────────────────────────────────────────────

/** Identifiers of the policy invariants, in evaluation order. */
export type PolicyRule =
  | 'policy-id-range'
  | 'dscp-range'
  | 'user-priority-range'
  | 'source-port-range'
  | 'protocol-int32'
  | 'destination-port-range'
  | 'direction-enum'
  | 'uplink-requires-dscp'
  | 'downlink-requires-user-priority';

export interface PolicyViolation extends FieldViolation {
  readonly rule: PolicyRule;
}

export interface ValidationResult {
  readonly valid: boolean;
  readonly violations: readonly PolicyViolation[];
}

// ─── Codec ───────────────────────────────────────────────────────

export interface PolicyCodecConfig {
  /** Largest payload accepted or produced, in bytes (default: 64 KiB) */
  maxMessageSize?: number;
  /** Validate decoded policies and reject invalid ones (default: false) */
  validateOnDecode?: boolean;
  /** Accept bytes left over after a single decoded policy (default: false) */
  allowTrailingBytes?: boolean;
  /** Logger for codec diagnostics */
  logger?: QosLogger;
}

// ─── JSON form ───────────────────────────────────────────────────

/** Plain-object form of a policy, as produced by `PolicyParams.toJSON()`. */
export interface PolicyParamsJSON {
  policyId: number;
  dscp: number;
  userPriority: number;
  sourceAddress: string | null;
  destinationAddress: string | null;
  sourcePort: number;
  protocol: number;
  destinationPortRange: [number, number] | null;
  direction: number;
}
