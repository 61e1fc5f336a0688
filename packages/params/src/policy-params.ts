/**
 * QoS policy parameters.
 *
 * A `PolicyParams` describes which packets a device should treat specially
 * (DSCP marking on uplink, user priority on downlink). Instances are created
 * through {@link PolicyBuilder} or decoded with {@link PolicyCodec} and are
 * immutable, except for the translated policy ID assigned by the receiving
 * system after it accepts the policy.
 *
 * @module policy-params
 */

import { InvalidArgumentError, createLogger } from '@qos-policy/core';
import { MacAddress } from './mac-address.js';
import type { PolicyParamsJSON, PolicyViolation, PortRange } from './types.js';
import { type PolicyFields, validatePolicyFields } from './validation.js';

const log = createLogger({ module: 'qos-policy:params' });

let instantiate: (fields: PolicyFields) => PolicyParams;

/**
 * Create a policy without running validation. Used by the builder and the
 * codec; not exported from the package entry point.
 */
export function instantiatePolicyParams(fields: PolicyFields): PolicyParams {
  return instantiate(fields);
}

function hashCombine(hash: number, value: number): number {
  return (Math.imul(hash, 31) + (value | 0)) | 0;
}

export class PolicyParams implements PolicyFields {
  /** Caller-assigned ID, unique per requesting application. */
  readonly policyId: number;
  /** DSCP to apply (uplink) or match (downlink), or `DSCP_ANY`. */
  readonly dscp: number;
  /** User priority to apply to matching downlink packets, or `USER_PRIORITY_ANY`. */
  readonly userPriority: number;
  readonly sourceAddress: MacAddress | null;
  readonly destinationAddress: MacAddress | null;
  /** Source port, or `SOURCE_PORT_ANY`. */
  readonly sourcePort: number;
  /** IP protocol, or `PROTOCOL_ANY`. */
  readonly protocol: number;
  /** Inclusive destination port range, or null when unrestricted. */
  readonly destinationPortRange: PortRange | null;
  readonly direction: number;

  private translatedId = 0;

  private constructor(fields: PolicyFields) {
    this.policyId = fields.policyId;
    this.dscp = fields.dscp;
    this.userPriority = fields.userPriority;
    this.sourceAddress = fields.sourceAddress;
    this.destinationAddress = fields.destinationAddress;
    this.sourcePort = fields.sourcePort;
    this.protocol = fields.protocol;
    this.destinationPortRange = fields.destinationPortRange
      ? Object.freeze([fields.destinationPortRange[0], fields.destinationPortRange[1]] as const)
      : null;
    this.direction = fields.direction;
  }

  static {
    instantiate = (fields) => new PolicyParams(fields);
  }

  /**
   * ID assigned by the receiving system once the policy is accepted.
   * Defaults to 0 and is never transmitted on the wire.
   */
  get translatedPolicyId(): number {
    return this.translatedId;
  }

  /**
   * Set the translated policy ID.
   *
   * Only the receiving system should call this. No synchronization is done
   * here: when an instance is shared, the writer and its readers must
   * coordinate externally.
   */
  setTranslatedPolicyId(translatedPolicyId: number): void {
    if (!Number.isInteger(translatedPolicyId)) {
      throw new InvalidArgumentError(
        'translatedPolicyId',
        `Translated policy ID must be an integer, got ${translatedPolicyId}`
      );
    }
    this.translatedId = translatedPolicyId;
  }

  /**
   * Check every invariant. Returns false if any fails, logging the first
   * failure. Use {@link getViolations} for the full list.
   */
  validate(): boolean {
    const result = validatePolicyFields(this);
    const [first] = result.violations;
    if (first) {
      log.error(first.message, undefined, {
        rule: first.rule,
        policyId: this.policyId,
        violationCount: result.violations.length,
      });
    }
    return result.valid;
  }

  /** Every violated invariant, in evaluation order. */
  getViolations(): PolicyViolation[] {
    return [...validatePolicyFields(this).violations];
  }

  /**
   * Field-wise equality. `translatedPolicyId` is not compared since it is
   * assigned locally and never transmitted.
   */
  equals(other: PolicyParams | null | undefined): boolean {
    if (this === other) return true;
    if (!other) return false;
    return (
      this.policyId === other.policyId &&
      this.dscp === other.dscp &&
      this.userPriority === other.userPriority &&
      MacAddress.equals(this.sourceAddress, other.sourceAddress) &&
      MacAddress.equals(this.destinationAddress, other.destinationAddress) &&
      this.sourcePort === other.sourcePort &&
      this.protocol === other.protocol &&
      rangesEqual(this.destinationPortRange, other.destinationPortRange) &&
      this.direction === other.direction
    );
  }

  hashCode(): number {
    let hash = 1;
    hash = hashCombine(hash, this.policyId);
    hash = hashCombine(hash, this.dscp);
    hash = hashCombine(hash, this.userPriority);
    hash = hashCombine(hash, this.sourceAddress?.hashCode() ?? 0);
    hash = hashCombine(hash, this.destinationAddress?.hashCode() ?? 0);
    hash = hashCombine(hash, this.sourcePort);
    hash = hashCombine(hash, this.protocol);
    hash = hashCombine(
      hash,
      this.destinationPortRange
        ? hashCombine(hashCombine(1, this.destinationPortRange[0]), this.destinationPortRange[1])
        : 0
    );
    hash = hashCombine(hash, this.direction);
    return hash;
  }

  toJSON(): PolicyParamsJSON {
    return {
      policyId: this.policyId,
      dscp: this.dscp,
      userPriority: this.userPriority,
      sourceAddress: this.sourceAddress?.toString() ?? null,
      destinationAddress: this.destinationAddress?.toString() ?? null,
      sourcePort: this.sourcePort,
      protocol: this.protocol,
      destinationPortRange: this.destinationPortRange
        ? [this.destinationPortRange[0], this.destinationPortRange[1]]
        : null,
      direction: this.direction,
    };
  }

  toString(): string {
    const range = this.destinationPortRange;
    return (
      `{policyId=${this.policyId}, ` +
      `dscp=${this.dscp}, ` +
      `userPriority=${this.userPriority}, ` +
      `srcAddr=${this.sourceAddress?.toString() ?? 'null'}, ` +
      `dstAddr=${this.destinationAddress?.toString() ?? 'null'}, ` +
      `srcPort=${this.sourcePort}, ` +
      `protocol=${this.protocol}, ` +
      `dstPortRange=${range ? `[${range[0]}, ${range[1]}]` : 'null'}, ` +
      `direction=${this.direction}}`
    );
  }
}

function rangesEqual(a: PortRange | null, b: PortRange | null): boolean {
  if (a === null || b === null) return a === b;
  return a[0] === b[0] && a[1] === b[1];
}
