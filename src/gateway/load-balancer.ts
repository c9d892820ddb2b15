import { err, ok, type Result } from "neverthrow";
import { configError, type BuildError } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import { hashedResourceName, sha256Hex } from "../core/naming.js";
import type { StringToken } from "../core/tokens.js";
import type {
  Attribute,
  IPAddressType,
  LoadBalancerScheme,
  LoadBalancerSpec,
  LoadBalancerType,
  SubnetMapping,
  Tags,
} from "../model/elbv2.js";
import type { Gateway, LoadBalancerConfigurationSpec } from "./inputs.js";

export const LOAD_BALANCER_RESOURCE_ID = "LoadBalancer";
export const LB_ATTRIBUTE_DELETION_PROTECTION = "deletion_protection.enabled";

export const buildLoadBalancerScheme = (
  lbConfig: LoadBalancerConfigurationSpec,
  defaultScheme: LoadBalancerScheme,
): Result<LoadBalancerScheme, BuildError> => {
  const raw = lbConfig.scheme;
  if (raw === undefined) {
    return ok(defaultScheme);
  }
  switch (raw) {
    case "internal":
    case "internet-facing":
      return ok(raw);
    default:
      return err(configError(`unknown scheme: ${raw}`));
  }
};

export const buildLoadBalancerIPAddressType = (
  lbConfig: LoadBalancerConfigurationSpec,
  defaultIPType: IPAddressType,
): Result<IPAddressType, BuildError> => {
  const raw = lbConfig.ipAddressType;
  if (raw === undefined) {
    return ok(defaultIPType);
  }
  switch (raw) {
    case "ipv4":
    case "dualstack":
    case "dualstack-without-public-ipv4":
      return ok(raw);
    default:
      return err(configError(`unknown IPAddressType: ${raw}`));
  }
};

// Unparseable values count as unprotected.
export const isDeleteProtected = (lbConfig: LoadBalancerConfigurationSpec, logger: Logger): boolean => {
  const attr = (lbConfig.loadBalancerAttributes ?? []).find(
    (a) => a.key === LB_ATTRIBUTE_DELETION_PROTECTION,
  );
  if (attr === undefined) {
    return false;
  }
  switch (attr.value.toLowerCase()) {
    case "true":
    case "1":
    case "t":
      return true;
    case "false":
    case "0":
    case "f":
      return false;
    default:
      logger.warn("unable to parse deletion protection value, assuming false", { value: attr.value });
      return false;
  }
};

export const buildLoadBalancerName = (
  clusterName: string,
  gateway: Gateway,
  scheme: LoadBalancerScheme,
  lbConfig: LoadBalancerConfigurationSpec,
): string => {
  if (lbConfig.loadBalancerName !== undefined) {
    return lbConfig.loadBalancerName;
  }
  const { namespace, name, uid } = gateway.metadata;
  return hashedResourceName(namespace, name, sha256Hex([clusterName, namespace, name, uid ?? "", scheme]));
};

const buildLoadBalancerAttributes = (lbConfig: LoadBalancerConfigurationSpec): readonly Attribute[] => {
  const attributes = new Map<string, string>();
  for (const attr of lbConfig.loadBalancerAttributes ?? []) {
    attributes.set(attr.key, attr.value);
  }
  return [...attributes.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => ({ key, value }));
};

export type LoadBalancerSpecInput = {
  readonly clusterName: string;
  readonly loadBalancerType: LoadBalancerType;
  readonly gateway: Gateway;
  readonly lbConfig: LoadBalancerConfigurationSpec;
  readonly scheme: LoadBalancerScheme;
  readonly ipAddressType: IPAddressType;
  readonly subnetMappings: readonly SubnetMapping[];
  readonly securityGroups: readonly StringToken[];
  readonly tags: Tags;
};

export const buildLoadBalancerSpec = (input: LoadBalancerSpecInput): LoadBalancerSpec => {
  const { lbConfig } = input;
  return {
    name: buildLoadBalancerName(input.clusterName, input.gateway, input.scheme, lbConfig),
    type: input.loadBalancerType,
    scheme: input.scheme,
    ipAddressType: input.ipAddressType,
    subnetMappings: input.subnetMappings,
    securityGroups: input.securityGroups,
    customerOwnedIPv4Pool: lbConfig.customerOwnedIpv4Pool,
    ipv4IPAMPoolID: lbConfig.ipv4IPAMPoolId,
    enforceSecurityGroupInboundRulesOnPrivateLinkTraffic:
      input.loadBalancerType === "network"
        ? lbConfig.enforceSecurityGroupInboundRulesOnPrivateLinkTraffic
        : undefined,
    loadBalancerAttributes: buildLoadBalancerAttributes(lbConfig),
    tags: input.tags,
  };
};
