/**
 * Wire codec for {@link PolicyParams}.
 *
 * Field order: policyId, dscp, userPriority, sourceAddress,
 * destinationAddress, sourcePort, protocol, destinationPortRange, direction.
 * The translated policy ID is local to the receiver and is not encoded.
 */

import {
  PolicyDecodeError,
  PolicyValidationError,
  QosError,
  createLogger,
  type QosLogger,
} from '@qos-policy/core';
import { type PolicyParams, instantiatePolicyParams } from './policy-params.js';
import type { PolicyCodecConfig, PortRange } from './types.js';
import { PRESENT, WireReader, WireWriter } from './wire.js';

type ResolvedCodecConfig = Required<PolicyCodecConfig>;

const DEFAULT_MAX_MESSAGE_SIZE = 64 * 1024;

function toPortRange(values: number[] | null, offset: number): PortRange | null {
  if (values === null || values.length === 0) return null;
  const [start, end] = values;
  if (values.length !== 2 || start === undefined || end === undefined) {
    throw new PolicyDecodeError(
      'QOS_W304',
      `Destination port range must hold 2 values, got ${values.length}`,
      offset
    );
  }
  return [start, end];
}

export class PolicyCodec {
  private readonly config: ResolvedCodecConfig;

  constructor(config: PolicyCodecConfig = {}) {
    this.config = {
      maxMessageSize: config.maxMessageSize ?? DEFAULT_MAX_MESSAGE_SIZE,
      validateOnDecode: config.validateOnDecode ?? false,
      allowTrailingBytes: config.allowTrailingBytes ?? false,
      logger: config.logger ?? createLogger({ module: 'qos-policy:codec' }),
    };
  }

  private get log(): QosLogger {
    return this.config.logger;
  }

  /** Append one policy to `writer`. */
  write(writer: WireWriter, params: PolicyParams): void {
    writer
      .writeInt32(params.policyId)
      .writeInt32(params.dscp)
      .writeInt32(params.userPriority)
      .writeNullableMac(params.sourceAddress)
      .writeNullableMac(params.destinationAddress)
      .writeInt32(params.sourcePort)
      .writeInt32(params.protocol)
      .writeNullableInt32Array(params.destinationPortRange)
      .writeInt32(params.direction);
  }

  /**
   * Read one policy from `reader`. The result is not validated unless
   * `validateOnDecode` is set.
   */
  read(reader: WireReader): PolicyParams {
    const policyId = reader.readInt32();
    const dscp = reader.readInt32();
    const userPriority = reader.readInt32();
    const sourceAddress = reader.readNullableMac();
    const destinationAddress = reader.readNullableMac();
    const sourcePort = reader.readInt32();
    const protocol = reader.readInt32();
    const rangeOffset = reader.position;
    const destinationPortRange = toPortRange(reader.readNullableInt32Array(), rangeOffset);
    const direction = reader.readInt32();

    const params = instantiatePolicyParams({
      policyId,
      dscp,
      userPriority,
      sourceAddress,
      destinationAddress,
      sourcePort,
      protocol,
      destinationPortRange,
      direction,
    });

    if (this.config.validateOnDecode) {
      const violations = params.getViolations();
      if (violations.length > 0) {
        throw new PolicyValidationError(violations, { policyId, source: 'decode' });
      }
    }
    return params;
  }

  encode(params: PolicyParams): Uint8Array {
    const writer = new WireWriter();
    this.write(writer, params);
    this.checkEncodedSize(writer.size);
    this.log.debug('Encoded policy', { policyId: params.policyId, size: writer.size });
    return writer.toBytes();
  }

  /** @throws PolicyDecodeError on truncated, oversized or malformed payloads */
  decode(data: Uint8Array): PolicyParams {
    this.checkDecodeSize(data);
    const reader = new WireReader(data);
    const params = this.read(reader);

    if (reader.remaining > 0 && !this.config.allowTrailingBytes) {
      throw new PolicyDecodeError(
        'QOS_W302',
        `${reader.remaining} unexpected bytes after policy ${params.policyId}`,
        reader.position
      );
    }
    this.log.debug('Decoded policy', { policyId: params.policyId, size: reader.position });
    return params;
  }

  /**
   * Encode several policies: an int32 count, then each policy preceded by an
   * int32 presence flag.
   */
  encodeList(list: readonly PolicyParams[]): Uint8Array {
    const end = this.log.time('encode-list');
    const writer = new WireWriter();
    writer.writeInt32(list.length);
    for (const params of list) {
      writer.writeInt32(PRESENT);
      this.write(writer, params);
    }
    this.checkEncodedSize(writer.size);
    end({ count: list.length, size: writer.size });
    return writer.toBytes();
  }

  /** Decode a payload produced by {@link encodeList}. A count of -1 is an empty list. */
  decodeList(data: Uint8Array): PolicyParams[] {
    this.checkDecodeSize(data);
    const end = this.log.time('decode-list');
    const reader = new WireReader(data);
    const count = reader.readInt32();
    if (count < -1) {
      throw new PolicyDecodeError('QOS_W304', `Invalid list length: ${count}`, 0);
    }

    const list: PolicyParams[] = [];
    for (let i = 0; i < count; i++) {
      const flagOffset = reader.position;
      const flag = reader.readInt32();
      if (flag !== PRESENT) {
        throw new PolicyDecodeError('QOS_W304', `Invalid presence flag for list entry ${i}: ${flag}`, flagOffset);
      }
      list.push(this.read(reader));
    }

    if (reader.remaining > 0 && !this.config.allowTrailingBytes) {
      throw new PolicyDecodeError(
        'QOS_W302',
        `${reader.remaining} unexpected bytes after policy list`,
        reader.position
      );
    }
    end({ count: list.length });
    return list;
  }

  private checkEncodedSize(size: number): void {
    if (size > this.config.maxMessageSize) {
      throw new QosError({
        code: 'QOS_W303',
        message: `Message size ${size} exceeds max ${this.config.maxMessageSize}`,
        context: { size, maxMessageSize: this.config.maxMessageSize },
      });
    }
  }

  private checkDecodeSize(data: Uint8Array): void {
    if (data.length > this.config.maxMessageSize) {
      throw new PolicyDecodeError(
        'QOS_W303',
        `Message size ${data.length} exceeds max ${this.config.maxMessageSize}`,
        0,
        { maxMessageSize: this.config.maxMessageSize }
      );
    }
  }
}

/** Create a policy codec */
export function createPolicyCodec(config?: PolicyCodecConfig): PolicyCodec {
  return new PolicyCodec(config);
}

const defaultCodec = new PolicyCodec();

/** Encode with the default codec configuration. */
export function encodePolicyParams(params: PolicyParams): Uint8Array {
  return defaultCodec.encode(params);
}

/** Decode with the default codec configuration. Does not validate. */
export function decodePolicyParams(data: Uint8Array): PolicyParams {
  return defaultCodec.decode(data);
}
