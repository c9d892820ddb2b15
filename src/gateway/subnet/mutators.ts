import { err, ok, type Result } from "neverthrow";
import { configError, type BuildError } from "../../core/errors.js";
import type { SubnetMapping } from "../../model/elbv2.js";
import type { Subnet } from "../collaborators.js";
import type { SubnetConfiguration } from "../inputs.js";

/**
 * A step of the subnet pipeline. Mutators only fill in allocation fields on existing mappings;
 * they never add, drop or reorder entries.
 */
export type SubnetMutator = {
  readonly name: string;
  mutate(
    mappings: SubnetMapping[],
    subnets: readonly Subnet[],
    configs: readonly SubnetConfiguration[],
  ): Result<void, BuildError>;
};

type AllocationField = "eipAllocation" | "privateIPv4Allocation" | "ipv6Allocation" | "sourceNatIPv6Prefix";

const allocationMutator = (
  name: string,
  field: AllocationField,
  apply: (mapping: SubnetMapping, value: string) => void,
): SubnetMutator => ({
  name,
  mutate: (mappings, _subnets, configs) => {
    const first = configs[0];
    if (first === undefined || first[field] === undefined) {
      return ok(undefined);
    }
    if (configs.length !== mappings.length) {
      return err(
        configError(
          `number of ${name} allocations (${configs.length}) and subnets (${mappings.length}) must match`,
        ),
      );
    }
    mappings.forEach((mapping, i) => {
      const value = configs[i]?.[field];
      if (value !== undefined) {
        apply(mapping, value);
      }
    });
    return ok(undefined);
  },
});

export const eipMutator = (): SubnetMutator =>
  allocationMutator("EIP", "eipAllocation", (mapping, value) => {
    mapping.allocationID = value;
  });

export const privateIPv4Mutator = (): SubnetMutator =>
  allocationMutator("private IPv4", "privateIPv4Allocation", (mapping, value) => {
    mapping.privateIPv4Address = value;
  });

export const ipv6Mutator = (): SubnetMutator =>
  allocationMutator("IPv6", "ipv6Allocation", (mapping, value) => {
    mapping.ipv6Address = value;
  });

export const sourceNATMutator = (): SubnetMutator =>
  allocationMutator("source NAT", "sourceNatIPv6Prefix", (mapping, value) => {
    mapping.sourceNatIPv6Prefix = value;
  });

// Fixed order; application load balancers take no mutators.
export const networkLoadBalancerMutators = (): readonly SubnetMutator[] => [
  eipMutator(),
  privateIPv4Mutator(),
  ipv6Mutator(),
  sourceNATMutator(),
];
