import { describe, it, expect } from 'vitest';
import { InvalidArgumentError, PolicyValidationError } from '@qos-policy/core';
import { MacAddress } from '../mac-address.js';
import { PolicyBuilder } from '../policy-builder.js';
import {
  DIRECTION_DOWNLINK,
  DIRECTION_UPLINK,
  DSCP_ANY,
  PROTOCOL_ANY,
  PROTOCOL_TCP,
  SOURCE_PORT_ANY,
  USER_PRIORITY_ANY,
  USER_PRIORITY_VIDEO_HIGH,
} from '../types.js';

function buildError(builder: PolicyBuilder): PolicyValidationError {
  try {
    builder.build();
  } catch (error) {
    if (error instanceof PolicyValidationError) return error;
    throw error;
  }
  throw new Error('expected build() to fail');
}

describe('PolicyBuilder', () => {
  describe('defaults', () => {
    it('should build an uplink policy with only a DSCP', () => {
      const policy = new PolicyBuilder(5, DIRECTION_UPLINK).setDscp(10).build();
      expect(policy.policyId).toBe(5);
      expect(policy.dscp).toBe(10);
      expect(policy.userPriority).toBe(USER_PRIORITY_ANY);
      expect(policy.direction).toBe(DIRECTION_UPLINK);
      expect(policy.sourceAddress).toBeNull();
      expect(policy.destinationAddress).toBeNull();
      expect(policy.sourcePort).toBe(SOURCE_PORT_ANY);
      expect(policy.protocol).toBe(PROTOCOL_ANY);
      expect(policy.destinationPortRange).toBeNull();
      expect(policy.translatedPolicyId).toBe(0);
    });

    it('should build a downlink policy with only a user priority', () => {
      const policy = new PolicyBuilder(9, DIRECTION_DOWNLINK).setUserPriority(USER_PRIORITY_VIDEO_HIGH).build();
      expect(policy.userPriority).toBe(5);
      expect(policy.dscp).toBe(DSCP_ANY);
    });
  });

  describe('policy ID', () => {
    it('should accept every ID in 1..255', () => {
      for (let id = 1; id <= 255; id++) {
        expect(new PolicyBuilder(id, DIRECTION_UPLINK).setDscp(0).build().policyId).toBe(id);
      }
    });

    it('should reject IDs outside 1..255', () => {
      for (const id of [-1, 0, 256, 300, 1.5]) {
        const error = buildError(new PolicyBuilder(id, DIRECTION_UPLINK).setDscp(1));
        expect(error.violations.map((v) => v.rule)).toEqual(['policy-id-range']);
      }
    });
  });

  describe('direction requirements', () => {
    it('should reject uplink without a DSCP', () => {
      const error = buildError(new PolicyBuilder(5, DIRECTION_UPLINK));
      expect(error.violations).toEqual([
        {
          rule: 'uplink-requires-dscp',
          field: 'dscp',
          value: -1,
          message: 'DSCP must be provided for uplink requests',
        },
      ]);
    });

    it('should accept uplink with any DSCP in 0..63', () => {
      for (let dscp = 0; dscp <= 63; dscp++) {
        expect(new PolicyBuilder(5, DIRECTION_UPLINK).setDscp(dscp).build().dscp).toBe(dscp);
      }
    });

    it('should reject downlink without a user priority', () => {
      const error = buildError(new PolicyBuilder(5, DIRECTION_DOWNLINK));
      expect(error.violations.map((v) => v.rule)).toEqual(['downlink-requires-user-priority']);
      expect(error.code).toBe('QOS_V100');
      expect(error.context['policyId']).toBe(5);
    });

    it('should accept downlink with any user priority in 0..7', () => {
      for (let up = 0; up <= 7; up++) {
        expect(new PolicyBuilder(5, DIRECTION_DOWNLINK).setUserPriority(up).build().userPriority).toBe(up);
      }
    });

    it('should reject unknown directions', () => {
      const error = buildError(new PolicyBuilder(5, 2).setDscp(1).setUserPriority(1));
      expect(error.violations.map((v) => v.rule)).toEqual(['direction-enum']);
    });
  });

  describe('ranges', () => {
    it('should report every violated rule', () => {
      const error = buildError(
        new PolicyBuilder(0, DIRECTION_UPLINK)
          .setDscp(64)
          .setUserPriority(8)
          .setSourcePort(65536)
          .setDestinationPortRange(-1, 10)
      );
      expect(error.violations.map((v) => v.rule)).toEqual([
        'policy-id-range',
        'dscp-range',
        'user-priority-range',
        'source-port-range',
        'destination-port-range',
      ]);
    });

    it('should accept the boundary values', () => {
      const policy = new PolicyBuilder(255, DIRECTION_UPLINK)
        .setDscp(63)
        .setUserPriority(7)
        .setSourcePort(65535)
        .setDestinationPortRange(0, 65535)
        .build();
      expect(policy.destinationPortRange).toEqual([0, 65535]);
    });

    it('should not require the port range to be ordered', () => {
      const policy = new PolicyBuilder(1, DIRECTION_UPLINK).setDscp(1).setDestinationPortRange(9000, 80).build();
      expect(policy.destinationPortRange).toEqual([9000, 80]);
    });

    it('should accept any protocol number', () => {
      expect(new PolicyBuilder(1, DIRECTION_UPLINK).setDscp(1).setProtocol(99).build().protocol).toBe(99);
      expect(new PolicyBuilder(1, DIRECTION_UPLINK).setDscp(1).setProtocol(2 ** 31 - 1).build().protocol).toBe(
        2147483647
      );
      expect(new PolicyBuilder(1, DIRECTION_UPLINK).setDscp(1).setProtocol(-(2 ** 31)).build().protocol).toBe(
        -2147483648
      );
    });

    it('should reject protocols that are not 32-bit integers', () => {
      for (const protocol of [2 ** 32 + 6, 2 ** 31, -(2 ** 31) - 1, 6.5, NaN]) {
        const error = buildError(new PolicyBuilder(1, DIRECTION_UPLINK).setDscp(1).setProtocol(protocol));
        expect(error.violations.map((v) => v.rule)).toEqual(['protocol-int32']);
        expect(error.violations[0]!.field).toBe('protocol');
      }
      const error = buildError(new PolicyBuilder(1, DIRECTION_UPLINK).setDscp(1).setProtocol(6.5));
      expect(error.violations[0]!.message).toBe('Protocol is not a 32-bit integer: 6.5');
    });

    it('should describe the offending port range', () => {
      const error = buildError(new PolicyBuilder(1, DIRECTION_UPLINK).setDscp(1).setDestinationPortRange(10, 70000));
      expect(error.violations[0]!.message).toBe('Dst port range value not valid. start=10, end=70000');
      expect(error.violations[0]!.value).toEqual([10, 70000]);
    });
  });

  describe('addresses', () => {
    it('should accept MacAddress instances and strings', () => {
      const policy = new PolicyBuilder(1, DIRECTION_UPLINK)
        .setDscp(1)
        .setSourceAddress(MacAddress.fromString('00:11:22:33:44:55'))
        .setDestinationAddress('66:77:88:99:aa:bb')
        .build();
      expect(policy.sourceAddress?.toString()).toBe('00:11:22:33:44:55');
      expect(policy.destinationAddress?.toString()).toBe('66:77:88:99:aa:bb');
    });

    it('should reject absent addresses', () => {
      const builder = new PolicyBuilder(1, DIRECTION_UPLINK);
      const missing = null as unknown as MacAddress;
      expect(() => builder.setSourceAddress(missing)).toThrow(InvalidArgumentError);
      expect(() => builder.setDestinationAddress(missing)).toThrow('Destination address cannot be null');
    });
  });

  describe('reuse', () => {
    it('should produce equal, independent snapshots', () => {
      const builder = new PolicyBuilder(3, DIRECTION_UPLINK).setDscp(8);
      const first = builder.build();
      const second = builder.build();
      expect(first).not.toBe(second);
      expect(first.equals(second)).toBe(true);
    });

    it('should not change earlier snapshots when the builder changes', () => {
      const builder = new PolicyBuilder(3, DIRECTION_UPLINK).setDscp(8).setDestinationPortRange(1, 2);
      const first = builder.build();
      builder.setDscp(16).setDestinationPortRange(3, 4);
      const second = builder.build();
      expect(first.dscp).toBe(8);
      expect(first.destinationPortRange).toEqual([1, 2]);
      expect(second.dscp).toBe(16);
      expect(first.equals(second)).toBe(false);
    });

    it('should start from an existing policy', () => {
      const original = new PolicyBuilder(4, DIRECTION_DOWNLINK)
        .setUserPriority(6)
        .setProtocol(PROTOCOL_TCP)
        .setDestinationPortRange(443, 443)
        .build();
      const copy = PolicyBuilder.from(original).build();
      expect(copy.equals(original)).toBe(true);

      const variant = PolicyBuilder.from(original).setUserPriority(7).build();
      expect(variant.userPriority).toBe(7);
      expect(variant.protocol).toBe(PROTOCOL_TCP);
      expect(original.userPriority).toBe(6);
    });
  });
});
