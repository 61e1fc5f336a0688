/**
 * @qos-policy/params
 *
 * QoS traffic classification policies: the value type, its builder and
 * invariants, and the wire codec.
 */

// Types & constants
export * from './types.js';

// Values
export { MacAddress, MAC_ADDRESS_LENGTH } from './mac-address.js';
export { PolicyParams } from './policy-params.js';
export { PolicyBuilder } from './policy-builder.js';

// Validation
export { isDirection, validatePolicyFields, type PolicyFields } from './validation.js';

// Wire
export { WireReader, WireWriter } from './wire.js';
export {
  PolicyCodec,
  createPolicyCodec,
  decodePolicyParams,
  encodePolicyParams,
} from './policy-codec.js';

// JSON
export { parsePolicyParams, policyParamsJSONSchema, type PolicyParamsInput } from './schema.js';
