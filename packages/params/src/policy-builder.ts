/**
 * Builder for {@link PolicyParams}.
 *
 * @example
 * ```typescript
 * const policy = new PolicyBuilder(5, DIRECTION_UPLINK)
 *   .setDscp(46)
 *   .setProtocol(PROTOCOL_UDP)
 *   .setDestinationPortRange(5000, 5100)
 *   .build();
 * ```
 */

import { InvalidArgumentError, PolicyValidationError } from '@qos-policy/core';
import { MacAddress } from './mac-address.js';
import { type PolicyParams, instantiatePolicyParams } from './policy-params.js';
import { DSCP_ANY, PROTOCOL_ANY, SOURCE_PORT_ANY, USER_PRIORITY_ANY, type PortRange } from './types.js';

function toAddress(value: MacAddress | string | null | undefined, argument: string, label: string): MacAddress {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError(argument, `${label} cannot be null`);
  }
  return typeof value === 'string' ? MacAddress.fromString(value) : value;
}

export class PolicyBuilder {
  private readonly policyId: number;
  private readonly direction: number;
  private sourceAddress: MacAddress | null = null;
  private destinationAddress: MacAddress | null = null;
  private dscp = DSCP_ANY;
  private userPriority = USER_PRIORITY_ANY;
  private sourcePort = SOURCE_PORT_ANY;
  private protocol = PROTOCOL_ANY;
  private destinationPortRange: PortRange | null = null;

  /**
   * @param policyId - ID unique to the requesting application, in 1..255.
   *   A policy whose ID is already installed is rejected by the receiving
   *   system; remove the existing one before sending a replacement.
   * @param direction - `DIRECTION_UPLINK` or `DIRECTION_DOWNLINK`.
   */
  constructor(policyId: number, direction: number) {
    this.policyId = policyId;
    this.direction = direction;
  }

  /** Start from an existing policy's fields, to emit a variant of it. */
  static from(params: PolicyParams): PolicyBuilder {
    const builder = new PolicyBuilder(params.policyId, params.direction);
    builder.sourceAddress = params.sourceAddress;
    builder.destinationAddress = params.destinationAddress;
    builder.dscp = params.dscp;
    builder.userPriority = params.userPriority;
    builder.sourcePort = params.sourcePort;
    builder.protocol = params.protocol;
    builder.destinationPortRange = params.destinationPortRange;
    return builder;
  }

  /** Match packets with the given source address. */
  setSourceAddress(value: MacAddress | string): this {
    this.sourceAddress = toAddress(value, 'sourceAddress', 'Source address');
    return this;
  }

  /** Match packets with the given destination address. */
  setDestinationAddress(value: MacAddress | string): this {
    this.destinationAddress = toAddress(value, 'destinationAddress', 'Destination address');
    return this;
  }

  /**
   * For uplink requests the DSCP is applied to matching packets; for downlink
   * requests it is part of the classifier.
   */
  setDscp(value: number): this {
    this.dscp = value;
    return this;
  }

  /** Priority applied to matching packets. Only applicable to downlink requests. */
  setUserPriority(value: number): this {
    this.userPriority = value;
    return this;
  }

  setSourcePort(value: number): this {
    this.sourcePort = value;
    return this;
  }

  setProtocol(value: number): this {
    this.protocol = value;
    return this;
  }

  /** Match packets whose destination port lies in `start..end` (inclusive). */
  setDestinationPortRange(start: number, end: number): this {
    this.destinationPortRange = [start, end];
    return this;
  }

  /**
   * Validate the staged fields and snapshot them into a new policy.
   * The builder stays usable afterwards.
   *
   * @throws PolicyValidationError listing every violated invariant
   */
  build(): PolicyParams {
    const params = instantiatePolicyParams({
      policyId: this.policyId,
      dscp: this.dscp,
      userPriority: this.userPriority,
      sourceAddress: this.sourceAddress,
      destinationAddress: this.destinationAddress,
      sourcePort: this.sourcePort,
      protocol: this.protocol,
      destinationPortRange: this.destinationPortRange,
      direction: this.direction,
    });

    if (!params.validate()) {
      throw new PolicyValidationError(params.getViolations(), { policyId: this.policyId });
    }
    return params;
  }
}
