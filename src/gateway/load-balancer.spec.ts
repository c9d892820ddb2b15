import { describe, expect, test, vi } from "vitest";
import { noopLogger, type Logger } from "../core/logger.js";
import { literal } from "../core/tokens.js";
import { testGateway } from "../testing/fixtures.js";
import {
  buildLoadBalancerIPAddressType,
  buildLoadBalancerName,
  buildLoadBalancerScheme,
  buildLoadBalancerSpec,
  isDeleteProtected,
} from "./load-balancer.js";

const gateway = testGateway([]);

describe("buildLoadBalancerScheme", () => {
  test("falls back to the default", () => {
    expect(buildLoadBalancerScheme({}, "internal")._unsafeUnwrap()).toBe("internal");
  });

  test("accepts known schemes", () => {
    expect(buildLoadBalancerScheme({ scheme: "internet-facing" }, "internal")._unsafeUnwrap()).toBe(
      "internet-facing",
    );
  });

  test("rejects unknown schemes", () => {
    expect(buildLoadBalancerScheme({ scheme: "public" }, "internal")._unsafeUnwrapErr().message).toBe(
      "unknown scheme: public",
    );
  });
});

describe("buildLoadBalancerIPAddressType", () => {
  test("accepts known types", () => {
    expect(buildLoadBalancerIPAddressType({ ipAddressType: "dualstack" }, "ipv4")._unsafeUnwrap()).toBe("dualstack");
    expect(buildLoadBalancerIPAddressType({}, "ipv4")._unsafeUnwrap()).toBe("ipv4");
  });

  test("rejects unknown types", () => {
    expect(buildLoadBalancerIPAddressType({ ipAddressType: "ipv6" }, "ipv4")._unsafeUnwrapErr().message).toBe(
      "unknown IPAddressType: ipv6",
    );
  });
});

describe("isDeleteProtected", () => {
  const withValue = (value: string) => ({
    loadBalancerAttributes: [{ key: "deletion_protection.enabled", value }],
  });

  test("parses boolean spellings", () => {
    expect(isDeleteProtected(withValue("TRUE"), noopLogger)).toBe(true);
    expect(isDeleteProtected(withValue("1"), noopLogger)).toBe(true);
    expect(isDeleteProtected(withValue("f"), noopLogger)).toBe(false);
    expect(isDeleteProtected({}, noopLogger)).toBe(false);
  });

  test("warns and treats unparseable values as unprotected", () => {
    const warn = vi.fn<Logger["warn"]>();
    const logger: Logger = { ...noopLogger, warn };
    expect(isDeleteProtected(withValue("yes"), logger)).toBe(false);
    expect(warn).toHaveBeenCalledWith("unable to parse deletion protection value, assuming false", {
      value: "yes",
    });
  });
});

describe("buildLoadBalancerName", () => {
  test("uses an explicit name", () => {
    expect(buildLoadBalancerName("test-cluster", gateway, "internal", { loadBalancerName: "my-lb" })).toBe("my-lb");
  });

  test("derives a stable name that depends on the scheme", () => {
    const internal = buildLoadBalancerName("test-cluster", gateway, "internal", {});
    expect(internal).toMatch(/^k8s-ns-gw-[0-9a-f]{10}$/);
    expect(buildLoadBalancerName("test-cluster", gateway, "internal", {})).toBe(internal);
    expect(buildLoadBalancerName("test-cluster", gateway, "internet-facing", {})).not.toBe(internal);
  });
});

describe("buildLoadBalancerSpec", () => {
  const input = {
    clusterName: "test-cluster",
    gateway,
    scheme: "internal" as const,
    ipAddressType: "ipv4" as const,
    subnetMappings: [{ subnetID: "subnet-a" }],
    securityGroups: [literal("sg-1")],
    tags: { env: "test" },
    lbConfig: {
      loadBalancerName: "my-lb",
      enforceSecurityGroupInboundRulesOnPrivateLinkTraffic: "on",
      loadBalancerAttributes: [
        { key: "idle_timeout.timeout_seconds", value: "60" },
        { key: "deletion_protection.enabled", value: "false" },
        { key: "idle_timeout.timeout_seconds", value: "120" },
      ],
    },
  };

  test("dedupes and sorts attributes", () => {
    const spec = buildLoadBalancerSpec({ ...input, loadBalancerType: "application" });
    expect(spec.loadBalancerAttributes).toEqual([
      { key: "deletion_protection.enabled", value: "false" },
      { key: "idle_timeout.timeout_seconds", value: "120" },
    ]);
    expect(spec.enforceSecurityGroupInboundRulesOnPrivateLinkTraffic).toBeUndefined();
  });

  test("keeps private link enforcement for network load balancers", () => {
    const spec = buildLoadBalancerSpec({ ...input, loadBalancerType: "network" });
    expect(spec).toEqual({
      name: "my-lb",
      type: "network",
      scheme: "internal",
      ipAddressType: "ipv4",
      subnetMappings: [{ subnetID: "subnet-a" }],
      securityGroups: [literal("sg-1")],
      enforceSecurityGroupInboundRulesOnPrivateLinkTraffic: "on",
      loadBalancerAttributes: [
        { key: "deletion_protection.enabled", value: "false" },
        { key: "idle_timeout.timeout_seconds", value: "120" },
      ],
      tags: { env: "test" },
    });
  });
});
