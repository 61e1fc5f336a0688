/**
 * Policy invariants.
 *
 * Every rule is evaluated so callers get the full list of violations; the
 * accept/reject outcome only depends on whether the list is empty.
 */

import type { MacAddress } from './mac-address.js';
import {
  DIRECTION_DOWNLINK,
  DIRECTION_UPLINK,
  DSCP_ANY,
  DSCP_MAX,
  PORT_MAX,
  POLICY_ID_MAX,
  POLICY_ID_MIN,
  SOURCE_PORT_ANY,
  USER_PRIORITY_ANY,
  USER_PRIORITY_VOICE_HIGH,
  type Direction,
  type PolicyRule,
  type PolicyViolation,
  type PortRange,
  type ValidationResult,
} from './types.js';

/** The field values a policy is validated against. */
export interface PolicyFields {
  readonly policyId: number;
  readonly dscp: number;
  readonly userPriority: number;
  readonly sourceAddress: MacAddress | null;
  readonly destinationAddress: MacAddress | null;
  readonly sourcePort: number;
  readonly protocol: number;
  readonly destinationPortRange: PortRange | null;
  readonly direction: number;
}

interface RuleDefinition {
  readonly rule: PolicyRule;
  readonly field: keyof PolicyFields;
  readonly check: (fields: PolicyFields) => boolean;
  readonly describe: (fields: PolicyFields) => string;
}

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

function inRange(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max;
}

export function isDirection(value: number): value is Direction {
  return value === DIRECTION_UPLINK || value === DIRECTION_DOWNLINK;
}

const RULES: readonly RuleDefinition[] = [
  {
    rule: 'policy-id-range',
    field: 'policyId',
    check: (f) => inRange(f.policyId, POLICY_ID_MIN, POLICY_ID_MAX),
    describe: (f) => `Policy ID not in valid range: ${f.policyId}`,
  },
  {
    rule: 'dscp-range',
    field: 'dscp',
    check: (f) => f.dscp === DSCP_ANY || inRange(f.dscp, 0, DSCP_MAX),
    describe: (f) => `DSCP value not in valid range: ${f.dscp}`,
  },
  {
    rule: 'user-priority-range',
    field: 'userPriority',
    check: (f) => inRange(f.userPriority, USER_PRIORITY_ANY, USER_PRIORITY_VOICE_HIGH),
    describe: (f) => `User priority not in valid range: ${f.userPriority}`,
  },
  {
    rule: 'source-port-range',
    field: 'sourcePort',
    check: (f) => inRange(f.sourcePort, SOURCE_PORT_ANY, PORT_MAX),
    describe: (f) => `Source port not in valid range: ${f.sourcePort}`,
  },
  {
    // Any protocol number is accepted, but it must survive the int32 encoding.
    rule: 'protocol-int32',
    field: 'protocol',
    check: (f) => inRange(f.protocol, INT32_MIN, INT32_MAX),
    describe: (f) => `Protocol is not a 32-bit integer: ${f.protocol}`,
  },
  {
    rule: 'destination-port-range',
    field: 'destinationPortRange',
    check: ({ destinationPortRange: range }) =>
      range === null || (inRange(range[0], 0, PORT_MAX) && inRange(range[1], 0, PORT_MAX)),
    describe: ({ destinationPortRange: range }) =>
      `Dst port range value not valid. start=${range?.[0]}, end=${range?.[1]}`,
  },
  {
    rule: 'direction-enum',
    field: 'direction',
    check: (f) => isDirection(f.direction),
    describe: (f) => `Invalid direction enum: ${f.direction}`,
  },
  {
    rule: 'uplink-requires-dscp',
    field: 'dscp',
    check: (f) => !(f.direction === DIRECTION_UPLINK && f.dscp === DSCP_ANY),
    describe: () => 'DSCP must be provided for uplink requests',
  },
  {
    rule: 'downlink-requires-user-priority',
    field: 'userPriority',
    check: (f) => !(f.direction === DIRECTION_DOWNLINK && f.userPriority === USER_PRIORITY_ANY),
    describe: () => 'User priority must be provided for downlink requests',
  },
];

/** Evaluate every invariant against `fields`. */
export function validatePolicyFields(fields: PolicyFields): ValidationResult {
  const violations: PolicyViolation[] = [];

  for (const definition of RULES) {
    if (!definition.check(fields)) {
      violations.push({
        rule: definition.rule,
        field: definition.field,
        value: fields[definition.field],
        message: definition.describe(fields),
      });
    }
  }

  return { valid: violations.length === 0, violations };
}
