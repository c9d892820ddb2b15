import { err, ok, type Result } from "neverthrow";
import { callCollaborator, configError, type BuildError } from "../../core/errors.js";
import type {
  IPAddressType,
  LoadBalancerScheme,
  LoadBalancerType,
  SubnetMapping,
  Tags,
} from "../../model/elbv2.js";
import type {
  LoadBalancerLister,
  Subnet,
  SubnetResolveOptions,
  SubnetsResolver,
} from "../collaborators.js";
import type { SubnetConfiguration } from "../inputs.js";
import { networkLoadBalancerMutators, type SubnetMutator } from "./mutators.js";

export type SubnetBuildInput = {
  readonly subnetConfigs?: readonly SubnetConfiguration[];
  readonly subnetTagSelector?: Readonly<Record<string, readonly string[]>>;
  readonly scheme: LoadBalancerScheme;
  readonly ipAddressType: IPAddressType;
  readonly stackTags: Tags;
  readonly signal?: AbortSignal;
};

export type SubnetBuildOutput = {
  readonly subnetMappings: readonly SubnetMapping[];
  readonly subnets: readonly Subnet[];
  readonly sourceNATEnabled: boolean;
};

export type SubnetModelBuilder = {
  build(input: SubnetBuildInput): Promise<Result<SubnetBuildOutput, BuildError>>;
};

const hasIdentifier = (c: SubnetConfiguration): boolean =>
  c.identifier !== undefined && c.identifier !== "";

type FieldCheck = {
  readonly present: (c: SubnetConfiguration) => boolean;
  readonly message: string;
};

const ALL_OR_NONE: readonly FieldCheck[] = [
  { present: hasIdentifier, message: "Either specify all subnet identifiers or none." },
  { present: (c) => c.eipAllocation !== undefined, message: "Either specify all eip allocations or none." },
  { present: (c) => c.ipv6Allocation !== undefined, message: "Either specify all ipv6 allocations or none." },
  {
    present: (c) => c.privateIPv4Allocation !== undefined,
    message: "Either specify all private ipv4 allocations or none.",
  },
  {
    present: (c) => c.sourceNatIPv6Prefix !== undefined,
    message: "Either specify all source nat prefixes or none.",
  },
];

/**
 * Validates per-subnet configuration. Returns whether source NAT prefixes are in use.
 */
export const validateSubnetsInput = (
  lbType: LoadBalancerType,
  configs: readonly SubnetConfiguration[] | undefined,
  scheme: LoadBalancerScheme,
  ipAddressType: IPAddressType,
): Result<boolean, BuildError> => {
  const first = configs?.[0];
  if (configs === undefined || first === undefined) {
    return ok(false);
  }

  const isNetwork = lbType === "network";

  if (first.eipAllocation !== undefined) {
    if (!isNetwork) {
      return err(configError("EIP Allocation is only allowed for Network LoadBalancers"));
    }
    if (scheme !== "internet-facing") {
      return err(configError("EIPAllocation can only be set for internet facing load balancers"));
    }
  }

  if (first.ipv6Allocation !== undefined) {
    if (!isNetwork) {
      return err(configError("IPv6Allocation is only supported for Network LoadBalancers"));
    }
    if (ipAddressType !== "dualstack") {
      return err(configError("IPv6Allocation can only be set for dualstack load balancers"));
    }
  }

  if (first.privateIPv4Allocation !== undefined) {
    if (!isNetwork) {
      return err(configError("PrivateIPv4Allocation is only supported for Network LoadBalancers"));
    }
    if (scheme !== "internal") {
      return err(configError("PrivateIPv4Allocation can only be set for internal load balancers"));
    }
  }

  if (first.sourceNatIPv6Prefix !== undefined && !isNetwork) {
    return err(configError("SourceNatIPv6Prefix is only supported for Network LoadBalancers"));
  }

  for (const check of ALL_OR_NONE) {
    const expected = check.present(first);
    if (configs.some((c) => check.present(c) !== expected)) {
      return err(configError(check.message));
    }
  }

  return ok(first.sourceNatIPv6Prefix !== undefined);
};

export const createSubnetModelBuilder = (
  lbType: LoadBalancerType,
  subnetsResolver: SubnetsResolver,
  loadBalancerLister: LoadBalancerLister,
): SubnetModelBuilder => {
  const mutators: readonly SubnetMutator[] = lbType === "network" ? networkLoadBalancerMutators() : [];

  const resolveEC2Subnets = async (
    input: SubnetBuildInput,
  ): Promise<Result<readonly Subnet[], BuildError>> => {
    const opts: SubnetResolveOptions = { lbType, lbScheme: input.scheme };
    const { signal } = input;
    const configs = input.subnetConfigs ?? [];
    const first = configs[0];

    if (first !== undefined && hasIdentifier(first)) {
      const identifiers = configs.map((c) => c.identifier ?? "");
      return callCollaborator(
        "resolve subnets by identifier",
        () => subnetsResolver.resolveViaNameOrIDSlice(identifiers, opts, signal),
        signal,
      );
    }

    const selector = input.subnetTagSelector;
    if (selector !== undefined && Object.keys(selector).length > 0) {
      return callCollaborator(
        "resolve subnets by tag selector",
        () => subnetsResolver.resolveViaSelector(selector, opts, signal),
        signal,
      );
    }

    const existing = await callCollaborator(
      "list existing load balancers",
      () => loadBalancerLister.listLoadBalancersByTags(input.stackTags, signal),
      signal,
    );
    if (existing.isErr()) {
      return err(existing.error);
    }

    const current = existing.value[0];
    if (current === undefined || current.scheme !== input.scheme) {
      return callCollaborator(
        "discover subnets",
        () => subnetsResolver.resolveViaDiscovery(opts, signal),
        signal,
      );
    }

    return callCollaborator(
      "resolve subnets of existing load balancer",
      () => subnetsResolver.resolveViaNameOrIDSlice(current.subnetIDs, opts, signal),
      signal,
    );
  };

  return {
    build: async (input) => {
      const validated = validateSubnetsInput(
        lbType,
        input.subnetConfigs,
        input.scheme,
        input.ipAddressType,
      );
      if (validated.isErr()) {
        return err(validated.error);
      }

      const resolved = await resolveEC2Subnets(input);
      if (resolved.isErr()) {
        return err(resolved.error);
      }

      const mappings: SubnetMapping[] = resolved.value.map((s) => ({ subnetID: s.subnetID }));
      const configs = input.subnetConfigs ?? [];
      for (const mutator of mutators) {
        const mutated = mutator.mutate(mappings, resolved.value, configs);
        if (mutated.isErr()) {
          return err(mutated.error);
        }
      }

      return ok({
        subnetMappings: mappings,
        subnets: resolved.value,
        sourceNATEnabled: validated.value,
      });
    },
  };
};
