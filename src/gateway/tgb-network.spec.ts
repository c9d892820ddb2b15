import { describe, expect, test, vi } from "vitest";
import { literal } from "../core/tokens.js";
import type { HealthCheckPort, Protocol, TargetGroupSpec, TargetType } from "../model/elbv2.js";
import type { VPCInfoProvider } from "./collaborators.js";
import type { SecurityGroupOutput } from "./security-group.js";
import {
  buildHealthCheckSourceCIDRs,
  createTargetGroupBindingNetworkBuilder,
  getPreserveClientIP,
  type TargetGroupBindingNetworkBuilderOptions,
} from "./tgb-network.js";

const tgSpec = (
  protocol: Protocol,
  targetType: TargetType,
  hcPort: HealthCheckPort = "traffic-port",
  attributes: TargetGroupSpec["targetGroupAttributes"] = [],
): TargetGroupSpec => ({
  name: "k8s-ns-r-0123456789",
  targetType,
  port: 80,
  protocol,
  ipAddressType: "ipv4",
  healthCheckConfig: {
    port: hcPort,
    protocol: "TCP",
    intervalSeconds: 15,
    timeoutSeconds: 5,
    healthyThresholdCount: 3,
    unhealthyThresholdCount: 3,
  },
  targetGroupAttributes: attributes,
  tags: {},
});

const backendSG = literal("sg-backend");
const fromBackend = [{ securityGroup: { groupID: backendSG } }];

const withSecurityGroups: SecurityGroupOutput = {
  securityGroupTokens: [literal("sg-lb"), backendSG],
  backendSecurityGroupToken: backendSG,
  backendSecurityGroupAllocated: true,
};

const withoutSecurityGroups: SecurityGroupOutput = {
  securityGroupTokens: [],
  backendSecurityGroupAllocated: false,
};

const subnets = [
  { subnetID: "subnet-a", cidrBlock: "10.0.0.0/24", ipv6CidrBlocks: [] },
  { subnetID: "subnet-b", cidrBlock: "10.0.1.0/24", ipv6CidrBlocks: [] },
];

const vpcInfoProvider: VPCInfoProvider = {
  fetchVPCCIDRBlocks: async () => ({ ipv4: ["10.0.0.0/16"], ipv6: [] }),
};

const newBuilder = (overrides: Partial<TargetGroupBindingNetworkBuilderOptions> = {}) =>
  createTargetGroupBindingNetworkBuilder({
    disableRestrictedSGRules: false,
    vpcID: "vpc-test",
    lbScheme: "internet-facing",
    sgOutput: withSecurityGroups,
    loadBalancerSubnets: subnets,
    vpcInfoProvider,
    ...overrides,
  });

describe("getPreserveClientIP", () => {
  test("is always on for UDP", () => {
    expect(getPreserveClientIP(tgSpec("UDP", "ip"))).toBe(true);
  });

  test("defaults by target type", () => {
    expect(getPreserveClientIP(tgSpec("TCP", "instance"))).toBe(true);
    expect(getPreserveClientIP(tgSpec("TCP", "ip"))).toBe(false);
  });

  test("follows the target group attribute", () => {
    const spec = tgSpec("TCP", "ip", "traffic-port", [{ key: "preserve_client_ip.enabled", value: "true" }]);
    expect(getPreserveClientIP(spec)).toBe(true);
  });
});

describe("buildHealthCheckSourceCIDRs", () => {
  const cidrs = ["10.0.0.0/24"];

  test("keeps a dedicated rule for user-restricted sources", () => {
    expect(
      buildHealthCheckSourceCIDRs(true, ["192.168.0.0/16"], cidrs, 80, "traffic-port", tgSpec("TCP", "instance"), false),
    ).toEqual(cidrs);
  });

  test("skips the rule for allow-all sources", () => {
    expect(
      buildHealthCheckSourceCIDRs(true, ["0.0.0.0/0"], cidrs, 80, 80, tgSpec("TCP", "instance"), false),
    ).toEqual([]);
  });

  test("always keeps the rule for UDP", () => {
    expect(
      buildHealthCheckSourceCIDRs(true, ["0.0.0.0/0"], cidrs, 80, "traffic-port", tgSpec("UDP", "instance"), true),
    ).toEqual(cidrs);
  });
});

describe("createTargetGroupBindingNetworkBuilder", () => {
  describe("with security groups", () => {
    test("allows the traffic port from the backend group", async () => {
      const result = await newBuilder().build(tgSpec("TCP", "ip"), 80);
      expect(result._unsafeUnwrap()).toEqual({
        ingress: [{ from: fromBackend, ports: [{ protocol: "TCP", port: 80 }] }],
      });
    });

    test("adds a TCP health check rule for UDP groups", async () => {
      const result = await newBuilder().build(tgSpec("UDP", "ip", 85), 80);
      expect(result._unsafeUnwrap()).toEqual({
        ingress: [
          { from: fromBackend, ports: [{ protocol: "UDP", port: 80 }] },
          { from: fromBackend, ports: [{ protocol: "TCP", port: 85 }] },
        ],
      });
    });

    test("checks UDP health on the traffic port over TCP", async () => {
      const result = await newBuilder().build(tgSpec("UDP", "ip"), 80);
      expect(result._unsafeUnwrap()).toEqual({
        ingress: [
          { from: fromBackend, ports: [{ protocol: "UDP", port: 80 }] },
          { from: fromBackend, ports: [{ protocol: "TCP", port: 80 }] },
        ],
      });
    });

    test("adds the target control port", async () => {
      const result = await newBuilder().build(tgSpec("TCP", "ip", 8080), 80, 3000);
      expect(result._unsafeUnwrap()).toEqual({
        ingress: [
          { from: fromBackend, ports: [{ protocol: "TCP", port: 80 }] },
          { from: fromBackend, ports: [{ protocol: "TCP", port: 8080 }] },
          { from: fromBackend, ports: [{ protocol: "TCP", port: 3000 }] },
        ],
      });
    });

    test("opens every port when restricted rules are disabled", async () => {
      const result = await newBuilder({ disableRestrictedSGRules: true }).build(tgSpec("TCP_UDP", "ip"), 80);
      expect(result._unsafeUnwrap()).toEqual({
        ingress: [{ from: fromBackend, ports: [{ protocol: "TCP" }, { protocol: "UDP" }] }],
      });
    });

    test("returns no networking without a backend group", async () => {
      const result = await newBuilder({
        sgOutput: { securityGroupTokens: [literal("sg-1")], backendSecurityGroupAllocated: false },
      }).build(tgSpec("TCP", "ip"), 80);
      expect(result._unsafeUnwrap()).toBeUndefined();
    });
  });

  describe("without security groups", () => {
    test("allows everyone on internet-facing load balancers preserving client IPs", async () => {
      const result = await newBuilder({ sgOutput: withoutSecurityGroups }).build(tgSpec("TCP", "instance"), 30080);
      expect(result._unsafeUnwrap()).toEqual({
        ingress: [{ from: [{ ipBlock: { cidr: "0.0.0.0/0" } }], ports: [{ protocol: "TCP", port: 30080 }] }],
      });
    });

    test("allows load balancer subnets when client IPs are not preserved", async () => {
      const result = await newBuilder({ sgOutput: withoutSecurityGroups }).build(tgSpec("TCP", "ip"), 8080);
      expect(result._unsafeUnwrap()).toEqual({
        ingress: [
          {
            from: [{ ipBlock: { cidr: "10.0.0.0/24" } }, { ipBlock: { cidr: "10.0.1.0/24" } }],
            ports: [{ protocol: "TCP", port: 8080 }],
          },
        ],
      });
    });

    test("reads VPC ranges for internal load balancers", async () => {
      const fetch = vi.fn(vpcInfoProvider.fetchVPCCIDRBlocks);
      const { signal } = new AbortController();
      const result = await newBuilder({
        sgOutput: withoutSecurityGroups,
        lbScheme: "internal",
        vpcInfoProvider: { fetchVPCCIDRBlocks: fetch },
        signal,
      }).build(tgSpec("TCP", "instance"), 30080);

      expect(fetch).toHaveBeenCalledWith("vpc-test", signal);
      expect(result._unsafeUnwrap()).toEqual({
        ingress: [{ from: [{ ipBlock: { cidr: "10.0.0.0/16" } }], ports: [{ protocol: "TCP", port: 30080 }] }],
      });
    });

    test("adds a subnet health check rule for user source ranges", async () => {
      const result = await newBuilder({
        sgOutput: withoutSecurityGroups,
        lbSourceRanges: ["192.168.0.0/16"],
      }).build(tgSpec("TCP", "instance"), 30080);

      expect(result._unsafeUnwrap()).toEqual({
        ingress: [
          { from: [{ ipBlock: { cidr: "192.168.0.0/16" } }], ports: [{ protocol: "TCP", port: 30080 }] },
          {
            from: [{ ipBlock: { cidr: "10.0.0.0/24" } }, { ipBlock: { cidr: "10.0.1.0/24" } }],
            ports: [{ protocol: "TCP", port: 30080 }],
          },
        ],
      });
    });

    test("opens both protocols for TCP_UDP groups", async () => {
      const result = await newBuilder({ sgOutput: withoutSecurityGroups }).build(tgSpec("TCP_UDP", "ip", 8081), 8080);
      expect(result._unsafeUnwrap()).toEqual({
        ingress: [
          {
            from: [{ ipBlock: { cidr: "0.0.0.0/0" } }],
            ports: [
              { protocol: "TCP", port: 8080 },
              { protocol: "UDP", port: 8080 },
            ],
          },
          {
            from: [{ ipBlock: { cidr: "10.0.0.0/24" } }, { ipBlock: { cidr: "10.0.1.0/24" } }],
            ports: [{ protocol: "TCP", port: 8081 }],
          },
        ],
      });
    });

    test("surfaces VPC lookup failures", async () => {
      const result = await newBuilder({
        sgOutput: withoutSecurityGroups,
        lbScheme: "internal",
        vpcInfoProvider: {
          fetchVPCCIDRBlocks: async () => {
            throw new Error("access denied");
          },
        },
      }).build(tgSpec("TCP", "instance"), 30080);

      expect(result._unsafeUnwrapErr().message).toBe("fetch VPC CIDR blocks: access denied");
    });
  });
});
