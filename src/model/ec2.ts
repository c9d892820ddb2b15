import type { Resource } from "../core/stack.js";
import { ref, type StringToken } from "../core/tokens.js";
import type { Tags } from "./elbv2.js";

export const SECURITY_GROUP = "AWS::EC2::SecurityGroup";

export type IPProtocol = "tcp" | "udp" | "icmp" | "icmpv6";

export type IPRange = {
  readonly cidrIP: string;
  readonly description?: string;
};

export type IPv6Range = {
  readonly cidrIPv6: string;
  readonly description?: string;
};

export type PrefixListID = {
  readonly listID: string;
  readonly description?: string;
};

export type IPPermission = {
  readonly ipProtocol: IPProtocol;
  readonly fromPort?: number;
  readonly toPort?: number;
  readonly ipRanges?: readonly IPRange[];
  readonly ipv6Ranges?: readonly IPv6Range[];
  readonly prefixLists?: readonly PrefixListID[];
};

export type SecurityGroupSpec = {
  readonly groupName: string;
  readonly description: string;
  readonly ingress: readonly IPPermission[];
  readonly tags: Tags;
};

export type SecurityGroup = Resource<typeof SECURITY_GROUP, SecurityGroupSpec>;

export const securityGroupID = (id: string): StringToken => ref(SECURITY_GROUP, id, "groupID");
