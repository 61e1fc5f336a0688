/**
 * Plain-object (JSON) form of a policy.
 *
 * The zod schema only checks shape and types. Range and cross-field rules
 * are enforced by {@link PolicyBuilder.build} as for any other policy.
 */

import { PolicyValidationError, type FieldViolation } from '@qos-policy/core';
import { z } from 'zod';
import { PolicyBuilder } from './policy-builder.js';
import type { PolicyParams } from './policy-params.js';
import { DSCP_ANY, PROTOCOL_ANY, SOURCE_PORT_ANY, USER_PRIORITY_ANY, type PolicyParamsJSON } from './types.js';

export const policyParamsJSONSchema = z
  .object({
    policyId: z.number().int(),
    direction: z.number().int(),
    dscp: z.number().int().default(DSCP_ANY),
    userPriority: z.number().int().default(USER_PRIORITY_ANY),
    sourceAddress: z.string().nullable().default(null),
    destinationAddress: z.string().nullable().default(null),
    sourcePort: z.number().int().default(SOURCE_PORT_ANY),
    protocol: z.number().int().default(PROTOCOL_ANY),
    destinationPortRange: z.tuple([z.number().int(), z.number().int()]).nullable().default(null),
  })
  .strict();

export type PolicyParamsInput = z.input<typeof policyParamsJSONSchema>;

function toViolations(error: z.ZodError): FieldViolation[] {
  return error.issues.map((issue) => ({
    rule: 'schema',
    field: issue.path.join('.') || '(root)',
    value: undefined,
    message: issue.message,
  }));
}

/**
 * Parse and validate a policy from its JSON form.
 *
 * @throws PolicyValidationError with code `QOS_V101` for shape errors, or
 * `QOS_V100` when the values break a policy invariant
 */
export function parsePolicyParams(input: unknown): PolicyParams {
  const result = policyParamsJSONSchema.safeParse(input);
  if (!result.success) {
    throw new PolicyValidationError(toViolations(result.error), undefined, 'QOS_V101');
  }

  const json: PolicyParamsJSON = result.data;
  const builder = new PolicyBuilder(json.policyId, json.direction)
    .setDscp(json.dscp)
    .setUserPriority(json.userPriority)
    .setSourcePort(json.sourcePort)
    .setProtocol(json.protocol);

  if (json.sourceAddress !== null) builder.setSourceAddress(json.sourceAddress);
  if (json.destinationAddress !== null) builder.setDestinationAddress(json.destinationAddress);
  if (json.destinationPortRange !== null) {
    builder.setDestinationPortRange(json.destinationPortRange[0], json.destinationPortRange[1]);
  }

  return builder.build();
}
