import { err, ok, type Result } from "neverthrow";
import { callCollaborator, configError, type BuildError } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import { hashedResourceName, sha256Hex } from "../core/naming.js";
import { literal, tokenToString, type StringToken } from "../core/tokens.js";
import {
  SECURITY_GROUP,
  securityGroupID,
  type IPPermission,
  type IPProtocol,
  type SecurityGroup,
} from "../model/ec2.js";
import { isIPv6Supported, type IPAddressType, type Tags } from "../model/elbv2.js";
import type { ModelStack } from "../model/index.js";
import type { BackendSecurityGroupProvider, SecurityGroupResolver } from "./collaborators.js";
import type { Gateway, LoadBalancerConfigurationSpec } from "./inputs.js";
import type { RouteDescriptor, RouteKind, RoutesByPort } from "./routes.js";

export const MANAGED_SECURITY_GROUP_ID = "ManagedLBSecurityGroup";
export const MANAGED_SECURITY_GROUP_DESCRIPTION = "[k8s] Managed SecurityGroup for LoadBalancer";

// Path MTU discovery: "fragmentation needed" for IPv4, "packet too big" for IPv6.
export const ICMPV4_TYPE_FOR_PATH_MTU = 3;
export const ICMPV4_CODE_FOR_PATH_MTU = 4;
export const ICMPV6_TYPE_FOR_PATH_MTU = 2;
export const ICMPV6_CODE_FOR_PATH_MTU = 0;

export type SecurityGroupOutput = {
  readonly securityGroupTokens: readonly StringToken[];
  readonly backendSecurityGroupToken?: StringToken;
  readonly backendSecurityGroupAllocated: boolean;
};

export type SecurityGroupBuildInput = {
  readonly stack: ModelStack;
  readonly gateway: Gateway;
  readonly lbConfig: LoadBalancerConfigurationSpec;
  readonly routes: RoutesByPort;
  readonly ipAddressType: IPAddressType;
  readonly tags: Tags;
  readonly signal?: AbortSignal;
};

export type SecurityGroupBuilder = {
  build(input: SecurityGroupBuildInput): Promise<Result<SecurityGroupOutput, BuildError>>;
};

export type SecurityGroupBuilderOptions = {
  readonly clusterName: string;
  readonly enableBackendSG: boolean;
  readonly sgResolver: SecurityGroupResolver;
  readonly backendSGProvider: BackendSecurityGroupProvider;
  readonly logger: Logger;
};

const isIPv6CIDR = (cidr: string): boolean => cidr.includes(":");

const routeKindProtocol = (kind: RouteKind): IPProtocol => (kind === "UDPRoute" ? "udp" : "tcp");

export const protocolsForRoutes = (routes: readonly RouteDescriptor[]): readonly IPProtocol[] => {
  const set = new Set<IPProtocol>();
  for (const route of routes) {
    set.add(routeKindProtocol(route.getRouteKind()));
  }
  return [...set].sort();
};

export const buildManagedSecurityGroupName = (clusterName: string, gateway: Gateway): string => {
  const { namespace, name, uid } = gateway.metadata;
  const digest = sha256Hex([clusterName, name, namespace, uid ?? ""]);
  return hashedResourceName(namespace, name, digest);
};

/**
 * Crosses every (port, protocol) implied by attached routes with every configured source.
 * IPv6 sources only apply when the load balancer is dual-stack.
 */
export const buildIngressPermissions = (
  lbConfig: LoadBalancerConfigurationSpec,
  routes: RoutesByPort,
  ipAddressType: IPAddressType,
): readonly IPPermission[] => {
  const sourceRanges = lbConfig.sourceRanges ?? [];
  const prefixes = lbConfig.securityGroupPrefixes ?? [];
  const includeIPv6 = isIPv6Supported(ipAddressType);
  const permissions: IPPermission[] = [];
  let udpSeen = false;

  const ports = [...routes.keys()].sort((a, b) => a - b);
  for (const port of ports) {
    for (const ipProtocol of protocolsForRoutes(routes.get(port) ?? [])) {
      if (ipProtocol === "udp") {
        udpSeen = true;
      }
      for (const cidr of sourceRanges) {
        if (!isIPv6CIDR(cidr)) {
          permissions.push({ ipProtocol, fromPort: port, toPort: port, ipRanges: [{ cidrIP: cidr }] });
        } else if (includeIPv6) {
          permissions.push({ ipProtocol, fromPort: port, toPort: port, ipv6Ranges: [{ cidrIPv6: cidr }] });
        }
      }
      for (const listID of prefixes) {
        permissions.push({ ipProtocol, fromPort: port, toPort: port, prefixLists: [{ listID }] });
      }
    }
  }

  if (lbConfig.enableICMP === true && udpSeen) {
    for (const cidr of new Set(sourceRanges)) {
      if (!isIPv6CIDR(cidr)) {
        permissions.push({
          ipProtocol: "icmp",
          fromPort: ICMPV4_TYPE_FOR_PATH_MTU,
          toPort: ICMPV4_CODE_FOR_PATH_MTU,
          ipRanges: [{ cidrIP: cidr }],
        });
      } else if (includeIPv6) {
        permissions.push({
          ipProtocol: "icmpv6",
          fromPort: ICMPV6_TYPE_FOR_PATH_MTU,
          toPort: ICMPV6_CODE_FOR_PATH_MTU,
          ipv6Ranges: [{ cidrIPv6: cidr }],
        });
      }
    }
  }

  return permissions;
};

export const createSecurityGroupBuilder = (
  options: SecurityGroupBuilderOptions,
): SecurityGroupBuilder => {
  const { clusterName, enableBackendSG, sgResolver, backendSGProvider, logger } = options;

  const getBackendSecurityGroup = async (
    gateway: Gateway,
    signal: AbortSignal | undefined,
  ): Promise<Result<StringToken, BuildError>> => {
    const { namespace, name } = gateway.metadata;
    const id = await callCollaborator(
      "get backend security group",
      () => backendSGProvider.get("gateway", [{ namespace, name }], signal),
      signal,
    );
    return id.map(literal);
  };

  const handleManaged = async (
    input: SecurityGroupBuildInput,
  ): Promise<Result<SecurityGroupOutput, BuildError>> => {
    const managed: SecurityGroup = {
      resourceType: SECURITY_GROUP,
      id: MANAGED_SECURITY_GROUP_ID,
      spec: {
        groupName: buildManagedSecurityGroupName(clusterName, input.gateway),
        description: MANAGED_SECURITY_GROUP_DESCRIPTION,
        ingress: buildIngressPermissions(input.lbConfig, input.routes, input.ipAddressType),
        tags: input.tags,
      },
    };
    const added = input.stack.add(managed);
    if (added.isErr()) {
      return err(added.error);
    }
    const managedToken = securityGroupID(added.value.id);

    if (!enableBackendSG) {
      logger.info("auto-created security group", { backendSG: tokenToString(managedToken) });
      return ok({
        securityGroupTokens: [managedToken],
        backendSecurityGroupToken: managedToken,
        backendSecurityGroupAllocated: false,
      });
    }

    const backend = await getBackendSecurityGroup(input.gateway, input.signal);
    if (backend.isErr()) {
      return err(backend.error);
    }
    logger.info("auto-created security group", { backendSG: tokenToString(backend.value) });
    return ok({
      securityGroupTokens: [managedToken, backend.value],
      backendSecurityGroupToken: backend.value,
      backendSecurityGroupAllocated: true,
    });
  };

  const handleSpecified = async (
    input: SecurityGroupBuildInput,
    nameOrIDs: readonly string[],
  ): Promise<Result<SecurityGroupOutput, BuildError>> => {
    const resolved = await callCollaborator(
      "resolve security groups",
      () => sgResolver.resolveViaNameOrID(nameOrIDs, input.signal),
      input.signal,
    );
    if (resolved.isErr()) {
      return err(resolved.error);
    }
    const tokens: StringToken[] = resolved.value.map(literal);

    if (input.lbConfig.manageBackendSecurityGroupRules !== true) {
      return ok({ securityGroupTokens: tokens, backendSecurityGroupAllocated: false });
    }
    if (!enableBackendSG) {
      return err(
        configError(
          "backendSG feature is required to manage worker node SG rules when frontendSG manually specified",
        ),
      );
    }
    const backend = await getBackendSecurityGroup(input.gateway, input.signal);
    if (backend.isErr()) {
      return err(backend.error);
    }
    logger.info("security groups configured explicitly", { count: tokens.length });
    return ok({
      securityGroupTokens: [...tokens, backend.value],
      backendSecurityGroupToken: backend.value,
      backendSecurityGroupAllocated: true,
    });
  };

  return {
    build: async (input) => {
      const nameOrIDs = input.lbConfig.securityGroups ?? [];
      if (nameOrIDs.length === 0) {
        return handleManaged(input);
      }
      return handleSpecified(input, nameOrIDs);
    },
  };
};
