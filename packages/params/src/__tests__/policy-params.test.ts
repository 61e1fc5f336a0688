import { describe, it, expect, afterEach } from 'vitest';
import { InvalidArgumentError, setLogHandler, type LogEntry } from '@qos-policy/core';
import { PolicyBuilder } from '../policy-builder.js';
import { PolicyParams, instantiatePolicyParams } from '../policy-params.js';
import * as api from '../index.js';
import { DIRECTION_DOWNLINK, DIRECTION_UPLINK, PROTOCOL_UDP } from '../types.js';

function fullBuilder(): PolicyBuilder {
  return new PolicyBuilder(42, DIRECTION_UPLINK)
    .setDscp(46)
    .setUserPriority(6)
    .setSourceAddress('00:11:22:33:44:55')
    .setDestinationAddress('66:77:88:99:aa:bb')
    .setSourcePort(5060)
    .setProtocol(PROTOCOL_UDP)
    .setDestinationPortRange(16384, 32767);
}

describe('PolicyParams', () => {
  afterEach(() => {
    setLogHandler(undefined);
  });

  describe('equality', () => {
    it('should be reflexive and symmetric', () => {
      const a = fullBuilder().build();
      const b = fullBuilder().build();
      expect(a.equals(a)).toBe(true);
      expect(a.equals(b)).toBe(true);
      expect(b.equals(a)).toBe(true);
      expect(a.hashCode()).toBe(b.hashCode());
    });

    it('should compare policies without addresses or range', () => {
      const a = new PolicyBuilder(1, DIRECTION_UPLINK).setDscp(1).build();
      const b = new PolicyBuilder(1, DIRECTION_UPLINK).setDscp(1).build();
      expect(a.equals(b)).toBe(true);
      expect(a.hashCode()).toBe(b.hashCode());
    });

    it('should differ when any single field differs', () => {
      const base = fullBuilder().build();
      const variants: PolicyParams[] = [
        PolicyBuilder.from(base).setDscp(45).build(),
        PolicyBuilder.from(base).setUserPriority(5).build(),
        PolicyBuilder.from(base).setSourceAddress('00:11:22:33:44:56').build(),
        PolicyBuilder.from(base).setDestinationAddress('66:77:88:99:aa:bc').build(),
        PolicyBuilder.from(base).setSourcePort(5061).build(),
        PolicyBuilder.from(base).setProtocol(6).build(),
        PolicyBuilder.from(base).setDestinationPortRange(16384, 32766).build(),
        new PolicyBuilder(43, DIRECTION_UPLINK)
          .setDscp(46)
          .setUserPriority(6)
          .setSourceAddress('00:11:22:33:44:55')
          .setDestinationAddress('66:77:88:99:aa:bb')
          .setSourcePort(5060)
          .setProtocol(PROTOCOL_UDP)
          .setDestinationPortRange(16384, 32767)
          .build(),
      ];
      for (const variant of variants) {
        expect(base.equals(variant)).toBe(false);
        expect(variant.equals(base)).toBe(false);
      }
    });

    it('should treat one absent address as unequal', () => {
      const withAddress = new PolicyBuilder(1, DIRECTION_UPLINK).setDscp(1).setSourceAddress('00:00:00:00:00:01').build();
      const without = new PolicyBuilder(1, DIRECTION_UPLINK).setDscp(1).build();
      expect(withAddress.equals(without)).toBe(false);
      expect(without.equals(withAddress)).toBe(false);
    });

    it('should treat one absent port range as unequal', () => {
      const withRange = new PolicyBuilder(1, DIRECTION_UPLINK).setDscp(1).setDestinationPortRange(0, 0).build();
      const without = new PolicyBuilder(1, DIRECTION_UPLINK).setDscp(1).build();
      expect(withRange.equals(without)).toBe(false);
      expect(without.equals(withRange)).toBe(false);
    });

    it('should differ by direction', () => {
      const up = new PolicyBuilder(1, DIRECTION_UPLINK).setDscp(1).setUserPriority(1).build();
      const down = new PolicyBuilder(1, DIRECTION_DOWNLINK).setDscp(1).setUserPriority(1).build();
      expect(up.equals(down)).toBe(false);
    });

    it('should ignore the translated policy ID', () => {
      const a = fullBuilder().build();
      const b = fullBuilder().build();
      b.setTranslatedPolicyId(17);
      expect(a.equals(b)).toBe(true);
    });

    it('should not equal null', () => {
      expect(fullBuilder().build().equals(null)).toBe(false);
      expect(fullBuilder().build().equals(undefined)).toBe(false);
    });
  });

  describe('translated policy ID', () => {
    it('should default to 0 and accept updates', () => {
      const policy = fullBuilder().build();
      expect(policy.translatedPolicyId).toBe(0);
      policy.setTranslatedPolicyId(1024);
      expect(policy.translatedPolicyId).toBe(1024);
    });

    it('should reject non-integers', () => {
      expect(() => fullBuilder().build().setTranslatedPolicyId(1.5)).toThrow(InvalidArgumentError);
    });
  });

  describe('immutability', () => {
    it('should freeze the destination port range', () => {
      const range = fullBuilder().build().destinationPortRange;
      expect(Object.isFrozen(range)).toBe(true);
    });
  });

  describe('validate', () => {
    it('should return true for built policies', () => {
      expect(fullBuilder().build().validate()).toBe(true);
      expect(fullBuilder().build().getViolations()).toEqual([]);
    });

    it('should return false and log the first violation', () => {
      const entries: LogEntry[] = [];
      setLogHandler((entry) => entries.push(entry));

      const policy = instantiatePolicyParams({
        policyId: 0,
        dscp: 99,
        userPriority: -1,
        sourceAddress: null,
        destinationAddress: null,
        sourcePort: -1,
        protocol: -1,
        destinationPortRange: null,
        direction: DIRECTION_UPLINK,
      });

      expect(policy.validate()).toBe(false);
      expect(entries).toHaveLength(1);
      expect(entries[0]!.level).toBe('error');
      expect(entries[0]!.module).toBe('qos-policy:params');
      expect(entries[0]!.message).toBe('Policy ID not in valid range: 0');
      expect(entries[0]!.context).toMatchObject({ rule: 'policy-id-range', violationCount: 2 });
      expect(policy.getViolations().map((v) => v.rule)).toEqual(['policy-id-range', 'dscp-range']);
    });
  });

  describe('construction', () => {
    it('should only be reachable through the builder and codec', () => {
      expect('unchecked' in PolicyParams).toBe(false);
      expect('instantiatePolicyParams' in api).toBe(false);
      expect(api.PolicyParams).toBe(PolicyParams);
    });
  });

  describe('toString', () => {
    it('should list fields in declaration order', () => {
      expect(fullBuilder().build().toString()).toBe(
        '{policyId=42, dscp=46, userPriority=6, srcAddr=00:11:22:33:44:55, ' +
          'dstAddr=66:77:88:99:aa:bb, srcPort=5060, protocol=17, ' +
          'dstPortRange=[16384, 32767], direction=0}'
      );
    });

    it('should print absent values as null', () => {
      expect(new PolicyBuilder(5, DIRECTION_UPLINK).setDscp(10).build().toString()).toBe(
        '{policyId=5, dscp=10, userPriority=-1, srcAddr=null, dstAddr=null, ' +
          'srcPort=-1, protocol=-1, dstPortRange=null, direction=0}'
      );
    });
  });

  describe('toJSON', () => {
    it('should produce a plain object without the translated ID', () => {
      const policy = fullBuilder().build();
      policy.setTranslatedPolicyId(3);
      expect(policy.toJSON()).toEqual({
        policyId: 42,
        dscp: 46,
        userPriority: 6,
        sourceAddress: '00:11:22:33:44:55',
        destinationAddress: '66:77:88:99:aa:bb',
        sourcePort: 5060,
        protocol: 17,
        destinationPortRange: [16384, 32767],
        direction: 0,
      });
    });
  });
});
