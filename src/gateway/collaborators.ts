import type { LoadBalancerScheme, LoadBalancerType, Tags } from "../model/elbv2.js";
import type { NamespacedName } from "./inputs.js";

export type Subnet = {
  readonly subnetID: string;
  readonly availabilityZone?: string;
  readonly cidrBlock: string;
  readonly ipv6CidrBlocks: readonly string[];
};

export type SubnetResolveOptions = {
  readonly lbType: LoadBalancerType;
  readonly lbScheme: LoadBalancerScheme;
};

export type SubnetsResolver = {
  resolveViaNameOrIDSlice(
    nameOrIDs: readonly string[],
    opts: SubnetResolveOptions,
    signal?: AbortSignal,
  ): Promise<readonly Subnet[]>;
  resolveViaSelector(
    tags: Readonly<Record<string, readonly string[]>>,
    opts: SubnetResolveOptions,
    signal?: AbortSignal,
  ): Promise<readonly Subnet[]>;
  resolveViaDiscovery(opts: SubnetResolveOptions, signal?: AbortSignal): Promise<readonly Subnet[]>;
  isSubnetInLocalZoneOrOutpost(subnetID: string, signal?: AbortSignal): Promise<boolean>;
};

export type ExistingLoadBalancer = {
  readonly scheme: LoadBalancerScheme;
  readonly subnetIDs: readonly string[];
};

export type LoadBalancerLister = {
  listLoadBalancersByTags(tags: Tags, signal?: AbortSignal): Promise<readonly ExistingLoadBalancer[]>;
};

export type SecurityGroupResolver = {
  resolveViaNameOrID(nameOrIDs: readonly string[], signal?: AbortSignal): Promise<readonly string[]>;
};

export type BackendSecurityGroupProvider = {
  get(
    resourceType: "gateway",
    resources: readonly NamespacedName[],
    signal?: AbortSignal,
  ): Promise<string>;
};

export type VPCInfoProvider = {
  // Always a fresh read; callers must not be served cached CIDRs.
  fetchVPCCIDRBlocks(
    vpcID: string,
    signal?: AbortSignal,
  ): Promise<{ ipv4: readonly string[]; ipv6: readonly string[] }>;
};

export type CertDiscovery = {
  discover(hostnames: readonly string[], signal?: AbortSignal): Promise<readonly string[]>;
};

export type TrustStoreResolver = {
  getARNByName(name: string, signal?: AbortSignal): Promise<string>;
};

export type TargetGroupARNMapper = {
  getARNByName(name: string, signal?: AbortSignal): Promise<string>;
};

export type SecretsManager = {
  getSecretData(key: NamespacedName, signal?: AbortSignal): Promise<Readonly<Record<string, string>>>;
};

/**
 * Cloud and cluster lookups the builders depend on. Every call takes the build's optional
 * abort signal as its last argument.
 */
export type Collaborators = {
  readonly subnetsResolver: SubnetsResolver;
  readonly loadBalancerLister: LoadBalancerLister;
  readonly securityGroupResolver: SecurityGroupResolver;
  readonly backendSGProvider: BackendSecurityGroupProvider;
  readonly vpcInfoProvider: VPCInfoProvider;
  readonly certDiscovery: CertDiscovery;
  readonly trustStoreResolver: TrustStoreResolver;
  readonly targetGroupARNMapper: TargetGroupARNMapper;
  readonly secretsManager: SecretsManager;
};
