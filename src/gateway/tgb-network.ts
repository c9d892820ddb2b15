import { err, ok, type Result } from "neverthrow";
import { callCollaborator, type BuildError } from "../core/errors.js";
import {
  HEALTH_CHECK_PORT_TRAFFIC_PORT,
  type HealthCheckPort,
  type LoadBalancerScheme,
  type TargetGroupIPAddressType,
  type TargetGroupSpec,
} from "../model/elbv2.js";
import type {
  NetworkingIngressRule,
  NetworkingPeer,
  NetworkingPort,
  TargetGroupBindingNetworking,
} from "../model/k8s.js";
import type { Subnet, VPCInfoProvider } from "./collaborators.js";
import type { SecurityGroupOutput } from "./security-group.js";

export const TG_ATTRIBUTE_PRESERVE_CLIENT_IP = "preserve_client_ip.enabled";

const ALLOW_ALL_IPV4 = "0.0.0.0/0";
const ALLOW_ALL_IPV6 = "::/0";

export type TargetPort = number | string;

export type TargetGroupBindingNetworkBuilder = {
  build(
    tgSpec: TargetGroupSpec,
    targetPort: TargetPort,
    targetControlPort?: number,
  ): Promise<Result<TargetGroupBindingNetworking | undefined, BuildError>>;
};

export type TargetGroupBindingNetworkBuilderOptions = {
  readonly disableRestrictedSGRules: boolean;
  readonly vpcID: string;
  readonly lbScheme: LoadBalancerScheme;
  readonly lbSourceRanges?: readonly string[];
  readonly sgOutput: SecurityGroupOutput;
  readonly loadBalancerSubnets: readonly Subnet[];
  readonly vpcInfoProvider: VPCInfoProvider;
  readonly signal?: AbortSignal;
};

const peerFromSecurityGroup = (sgOutput: SecurityGroupOutput): NetworkingPeer[] =>
  sgOutput.backendSecurityGroupToken === undefined
    ? []
    : [{ securityGroup: { groupID: sgOutput.backendSecurityGroupToken } }];

const peersFromCIDRs = (cidrs: readonly string[]): NetworkingPeer[] =>
  cidrs.map((cidr) => ({ ipBlock: { cidr } }));

/**
 * Client IP preservation is always on for UDP and TCP_UDP. Otherwise the
 * `preserve_client_ip.enabled` attribute decides, and absent that only instance targets keep it.
 */
export const getPreserveClientIP = (tgSpec: TargetGroupSpec): boolean => {
  if (tgSpec.protocol === "UDP" || tgSpec.protocol === "TCP_UDP") {
    return true;
  }
  const attr = tgSpec.targetGroupAttributes.find((a) => a.key === TG_ATTRIBUTE_PRESERVE_CLIENT_IP);
  if (attr !== undefined) {
    return parseBool(attr.value) ?? false;
  }
  return tgSpec.targetType === "instance";
};

const parseBool = (value: string): boolean | undefined => {
  switch (value) {
    case "1":
    case "t":
    case "T":
    case "true":
    case "TRUE":
    case "True":
      return true;
    case "0":
    case "f":
    case "F":
    case "false":
    case "FALSE":
    case "False":
      return false;
    default:
      return undefined;
  }
};

export const subnetCIDRBlocks = (
  ipType: TargetGroupIPAddressType,
  subnets: readonly Subnet[],
): readonly string[] =>
  ipType === "ipv4" ? subnets.map((s) => s.cidrBlock) : subnets.flatMap((s) => s.ipv6CidrBlocks);

const portsEqual = (hcPort: HealthCheckPort, targetPort: TargetPort): boolean =>
  hcPort === HEALTH_CHECK_PORT_TRAFFIC_PORT || hcPort === targetPort;

/**
 * Returns the sources that need a dedicated health check rule, or an empty list when the
 * traffic rule already admits health checks. A distinct rule is skipped only for non-UDP
 * groups whose health checks use the traffic port and whose traffic source is either the
 * subnets themselves, a defaulted range, or an allow-all range. A user-restricted source range
 * always gets the extra subnet rule.
 */
export const buildHealthCheckSourceCIDRs = (
  preserveClientIP: boolean,
  trafficSource: readonly string[],
  subnetCIDRs: readonly string[],
  targetPort: TargetPort,
  hcPort: HealthCheckPort,
  tgSpec: TargetGroupSpec,
  defaultRangeUsed: boolean,
): readonly string[] => {
  if (tgSpec.protocol !== "UDP" && portsEqual(hcPort, targetPort)) {
    if (!preserveClientIP || defaultRangeUsed) {
      return [];
    }
    if (trafficSource.some((src) => src === ALLOW_ALL_IPV4 || src === ALLOW_ALL_IPV6)) {
      return [];
    }
  }
  return subnetCIDRs;
};

export const createTargetGroupBindingNetworkBuilder = (
  options: TargetGroupBindingNetworkBuilderOptions,
): TargetGroupBindingNetworkBuilder => {
  const { sgOutput } = options;

  const standard = (
    tgSpec: TargetGroupSpec,
    targetPort: TargetPort,
    targetControlPort: number | undefined,
  ): TargetGroupBindingNetworking | undefined => {
    if (sgOutput.backendSecurityGroupToken === undefined) {
      return undefined;
    }
    const from = peerFromSecurityGroup(sgOutput);
    const udpSupported = tgSpec.protocol === "UDP" || tgSpec.protocol === "TCP_UDP";

    if (options.disableRestrictedSGRules) {
      const ports: NetworkingPort[] = [{ protocol: "TCP" }];
      if (udpSupported) {
        ports.push({ protocol: "UDP" });
      }
      return { ingress: [{ from, ports }] };
    }

    const hcPort = tgSpec.healthCheckConfig.port;
    const ports: NetworkingPort[] = [{ protocol: udpSupported ? "UDP" : "TCP", port: targetPort }];
    if (udpSupported || (typeof hcPort === "number" && hcPort !== targetPort)) {
      ports.push({ protocol: "TCP", port: typeof hcPort === "number" ? hcPort : targetPort });
    }
    if (targetControlPort !== undefined) {
      ports.push({ protocol: "TCP", port: targetControlPort });
    }
    return { ingress: ports.map((port) => ({ from, ports: [port] })) };
  };

  const defaultSourceRanges = async (
    tgSpec: TargetGroupSpec,
  ): Promise<Result<readonly string[], BuildError>> => {
    if (options.lbScheme !== "internal") {
      return ok([tgSpec.ipAddressType === "ipv6" ? ALLOW_ALL_IPV6 : ALLOW_ALL_IPV4]);
    }
    const vpc = await callCollaborator(
      "fetch VPC CIDR blocks",
      () => options.vpcInfoProvider.fetchVPCCIDRBlocks(options.vpcID, options.signal),
      options.signal,
    );
    return vpc.map((info) => (tgSpec.ipAddressType === "ipv4" ? info.ipv4 : info.ipv6));
  };

  const withoutSecurityGroups = async (
    tgSpec: TargetGroupSpec,
    targetPort: TargetPort,
  ): Promise<Result<TargetGroupBindingNetworking, BuildError>> => {
    const hcPort = tgSpec.healthCheckConfig.port;
    const subnetCIDRs = subnetCIDRBlocks(tgSpec.ipAddressType, options.loadBalancerSubnets);
    const preserveClientIP = getPreserveClientIP(tgSpec);

    let trafficSource = subnetCIDRs;
    let defaultRangeUsed = false;
    if (preserveClientIP) {
      trafficSource = options.lbSourceRanges ?? [];
      if (trafficSource.length === 0) {
        const defaults = await defaultSourceRanges(tgSpec);
        if (defaults.isErr()) {
          return err(defaults.error);
        }
        trafficSource = defaults.value;
        defaultRangeUsed = true;
      }
    }

    const trafficPorts: NetworkingPort[] =
      tgSpec.protocol === "TCP_UDP"
        ? [
            { protocol: "TCP", port: targetPort },
            { protocol: "UDP", port: targetPort },
          ]
        : [{ protocol: tgSpec.protocol === "UDP" ? "UDP" : "TCP", port: targetPort }];

    const ingress: NetworkingIngressRule[] = [
      { from: peersFromCIDRs(trafficSource), ports: trafficPorts },
    ];

    const hcSources = buildHealthCheckSourceCIDRs(
      preserveClientIP,
      trafficSource,
      subnetCIDRs,
      targetPort,
      hcPort,
      tgSpec,
      defaultRangeUsed,
    );
    if (hcSources.length > 0) {
      ingress.push({
        from: peersFromCIDRs(hcSources),
        ports: [{ protocol: "TCP", port: hcPort === HEALTH_CHECK_PORT_TRAFFIC_PORT ? targetPort : hcPort }],
      });
    }

    return ok({ ingress });
  };

  return {
    build: async (tgSpec, targetPort, targetControlPort) => {
      if (sgOutput.securityGroupTokens.length === 0) {
        return withoutSecurityGroups(tgSpec, targetPort);
      }
      return ok(standard(tgSpec, targetPort, targetControlPort));
    },
  };
};
