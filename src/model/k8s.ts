import type { Resource } from "../core/stack.js";
import type { StringToken } from "../core/tokens.js";
import type { Protocol, TargetGroupIPAddressType, TargetType } from "./elbv2.js";

export const TARGET_GROUP_BINDING = "K8S::ElasticLoadBalancingV2::TargetGroupBinding";

export type NetworkingProtocol = "TCP" | "UDP";

export type NetworkingPort = {
  readonly protocol?: NetworkingProtocol;
  // Omitted means every port.
  readonly port?: number | string;
};

export type NetworkingPeer =
  | { readonly securityGroup: { readonly groupID: StringToken } }
  | { readonly ipBlock: { readonly cidr: string } };

export type NetworkingIngressRule = {
  readonly from: readonly NetworkingPeer[];
  readonly ports: readonly NetworkingPort[];
};

export type TargetGroupBindingNetworking = {
  readonly ingress: readonly NetworkingIngressRule[];
};

export type LabelSelector = {
  readonly matchLabels?: Readonly<Record<string, string>>;
};

export type ObjectMeta = {
  readonly namespace: string;
  readonly name: string;
  readonly annotations: Readonly<Record<string, string>>;
  readonly labels: Readonly<Record<string, string>>;
};

export type TargetGroupBindingSpec = {
  readonly targetGroupARN: StringToken;
  readonly targetType: TargetType;
  readonly serviceRef: {
    readonly name: string;
    readonly port: number | string;
  };
  readonly networking?: TargetGroupBindingNetworking;
  readonly nodeSelector?: LabelSelector;
  readonly ipAddressType: TargetGroupIPAddressType;
  readonly vpcID: string;
  readonly multiClusterTargetGroup: boolean;
  readonly targetGroupProtocol: Protocol;
};

export type TargetGroupBindingResourceSpec = {
  readonly template: {
    readonly metadata: ObjectMeta;
    readonly spec: TargetGroupBindingSpec;
  };
};

export type TargetGroupBinding = Resource<typeof TARGET_GROUP_BINDING, TargetGroupBindingResourceSpec>;
