import { ok } from "neverthrow";
import { describe, expect, test, vi } from "vitest";
import { noopLogger } from "../core/logger.js";
import { literal } from "../core/tokens.js";
import {
  TARGET_GROUP,
  TARGET_GROUP_BINDING,
  newModelStack,
  targetGroupARN,
  type LoadBalancerType,
  type ModelStack,
  type TargetGroupBindingNetworking,
} from "../model/index.js";
import { createFakeCollaborators } from "../testing/fakes.js";
import { testGateway, testListener, testService, testServicePort } from "../testing/fixtures.js";
import { serviceBackend, staticRoute } from "../testing/routes.js";
import type { Service, TargetGroupProps } from "./inputs.js";
import type { Backend, RouteKind } from "./routes.js";
import { createTagHelper } from "./tags.js";
import { buildTargetGroupResourceID, createTargetGroupBuilder } from "./target-group.js";
import type { TargetGroupBindingNetworkBuilder } from "./tgb-network.js";

const gateway = testGateway([testListener(80, "HTTP")]);
const service = testService("svc", [testServicePort(80, 30080, 8080)]);

const route = (kind: RouteKind) => staticRoute({ kind, namespace: "ns", name: "route", rules: [] });

const setup = (loadBalancerType: LoadBalancerType = "application") => {
  const networking: TargetGroupBindingNetworking = { ingress: [] };
  const buildNetworking = vi.fn<TargetGroupBindingNetworkBuilder["build"]>(async () => ok(networking));
  const tgbNetworkBuilder: TargetGroupBindingNetworkBuilder = { build: buildNetworking };
  const fakes = createFakeCollaborators({ targetGroups: { "existing-tg": "arn:aws:test:tg/existing" } });
  const builder = createTargetGroupBuilder({
    clusterName: "test-cluster",
    vpcID: "vpc-test",
    loadBalancerType,
    defaultTargetType: "instance",
    tagHelper: createTagHelper({ env: "test" }, "overrideWins", []),
    tgbNetworkBuilder,
    targetGroupARNMapper: fakes.targetGroupARNMapper,
    logger: noopLogger,
  });
  const stack: ModelStack = newModelStack({ namespace: "ns", name: "gw" });
  const build = (kind: RouteKind, backend: Backend) =>
    builder.buildTargetGroup({
      stack,
      gateway,
      listenerPort: 80,
      lbIPType: "ipv4",
      route: route(kind),
      backend,
    });
  return { builder, stack, build, buildNetworking, networking };
};

const backendFor = (svc: Service, props?: TargetGroupProps) => {
  const port = svc.spec.ports[0];
  if (port === undefined) {
    throw new Error("service has no ports");
  }
  return serviceBackend(svc, port, { targetGroupProps: props });
};

describe("buildTargetGroupResourceID", () => {
  test("joins gateway, route, backend and port", () => {
    expect(
      buildTargetGroupResourceID(
        { namespace: "ns", name: "gw" },
        { namespace: "ns", name: "svc" },
        { namespace: "ns", name: "route" },
        "HTTPRoute",
        8080,
      ),
    ).toBe("ns/gw:ns-route:HTTPRoute-ns-svc:8080");
  });

  test("appends the target control port", () => {
    expect(
      buildTargetGroupResourceID(
        { namespace: "ns", name: "gw" },
        { namespace: "ns", name: "svc" },
        { namespace: "ns", name: "route" },
        "TCPRoute",
        8080,
        3000,
      ),
    ).toBe("ns/gw:ns-route:TCPRoute-ns-svc:8080:3000");
  });
});

describe("createTargetGroupBuilder", () => {
  describe("service backends", () => {
    test("builds a target group and its binding", async () => {
      const { stack, build, networking } = setup();
      const resID = "ns/gw:ns-route:HTTPRoute-ns-svc:8080";

      const result = await build("HTTPRoute", backendFor(service));
      expect(result._unsafeUnwrap()).toEqual(targetGroupARN(resID));

      const tg = stack.get(TARGET_GROUP, resID);
      expect(tg?.spec.name).toMatch(/^k8s-ns-route-[0-9a-f]{10}$/);
      expect(tg?.spec).toEqual({
        name: tg?.spec.name,
        targetType: "instance",
        port: 30080,
        protocol: "HTTP",
        protocolVersion: "HTTP1",
        ipAddressType: "ipv4",
        healthCheckConfig: {
          port: "traffic-port",
          protocol: "HTTP",
          path: "/",
          matcher: { httpCode: "200-399" },
          intervalSeconds: 15,
          timeoutSeconds: 5,
          healthyThresholdCount: 3,
          unhealthyThresholdCount: 3,
        },
        targetGroupAttributes: [],
        tags: { env: "test" },
      });

      const binding = stack.get(TARGET_GROUP_BINDING, resID);
      expect(binding?.spec.template.metadata).toEqual({
        namespace: "ns",
        name: tg?.spec.name,
        annotations: {},
        labels: {},
      });
      expect(binding?.spec.template.spec).toEqual({
        targetGroupARN: targetGroupARN(resID),
        targetType: "instance",
        serviceRef: { name: "svc", port: 80 },
        networking,
        nodeSelector: undefined,
        ipAddressType: "ipv4",
        vpcID: "vpc-test",
        multiClusterTargetGroup: false,
        targetGroupProtocol: "HTTP",
      });
    });

    test("reuses a target group built for the same backend", async () => {
      const { builder, stack, build, buildNetworking } = setup();

      const first = await build("HTTPRoute", backendFor(service));
      const second = await build("HTTPRoute", backendFor(service));

      expect(second._unsafeUnwrap()).toEqual(first._unsafeUnwrap());
      expect(stack.list(TARGET_GROUP)).toHaveLength(1);
      expect(stack.list(TARGET_GROUP_BINDING)).toHaveLength(1);
      expect(buildNetworking).toHaveBeenCalledTimes(1);
      expect(builder.targetGroupNameToARN().size).toBe(1);
    });

    test("passes the node port to the network builder for instance targets", async () => {
      const { build, buildNetworking } = setup();
      await build("HTTPRoute", backendFor(service, { targetControlPort: 3000 }));
      expect(buildNetworking).toHaveBeenCalledWith(expect.anything(), 30080, 3000);
    });

    test("uses gRPC health check defaults for GRPC routes", async () => {
      const { stack, build } = setup();
      await build("GRPCRoute", backendFor(service, { targetType: "ip" }));

      const tg = stack.get(TARGET_GROUP, "ns/gw:ns-route:GRPCRoute-ns-svc:8080");
      expect(tg?.spec.port).toBe(8080);
      expect(tg?.spec.protocolVersion).toBe("GRPC");
      expect(tg?.spec.healthCheckConfig.path).toBe("/AWS.ALB/healthcheck");
      expect(tg?.spec.healthCheckConfig.matcher).toEqual({ grpcCode: "12" });
    });

    test("checks the health check node port for local traffic on network load balancers", async () => {
      const local = testService("svc", [testServicePort(80, 30080, 8080)], {
        type: "LoadBalancer",
        externalTrafficPolicy: "Local",
        healthCheckNodePort: 32000,
      });
      const { stack, build } = setup("network");
      await build("TCPRoute", backendFor(local));

      const tg = stack.get(TARGET_GROUP, "ns/gw:ns-route:TCPRoute-ns-svc:8080");
      expect(tg?.spec.protocol).toBe("TCP");
      expect(tg?.spec.protocolVersion).toBeUndefined();
      expect(tg?.spec.healthCheckConfig).toEqual({
        port: 32000,
        protocol: "HTTP",
        path: "/healthz",
        matcher: { httpCode: "200-399" },
        intervalSeconds: 10,
        timeoutSeconds: 6,
        healthyThresholdCount: 2,
        unhealthyThresholdCount: 2,
      });
    });

    test("omits path and matcher for TCP health checks", async () => {
      const { stack, build } = setup("network");
      await build("TCPRoute", backendFor(service));

      const tg = stack.get(TARGET_GROUP, "ns/gw:ns-route:TCPRoute-ns-svc:8080");
      expect(tg?.spec.healthCheckConfig.protocol).toBe("TCP");
      expect(tg?.spec.healthCheckConfig.path).toBeUndefined();
      expect(tg?.spec.healthCheckConfig.matcher).toBeUndefined();
    });

    test("uses port 1 for IP targets with a named target port", async () => {
      const named = testService("svc", [testServicePort(80, 30080, "http")]);
      const { stack, build } = setup();
      await build("HTTPRoute", backendFor(named, { targetType: "ip" }));

      expect(stack.get(TARGET_GROUP, "ns/gw:ns-route:HTTPRoute-ns-svc:http")?.spec.port).toBe(1);
    });

    test("honors an explicit name and sorted attributes", async () => {
      const { stack, build, builder } = setup();
      await build(
        "HTTPRoute",
        backendFor(service, {
          targetGroupName: "custom-tg",
          targetGroupAttributes: [
            { key: "stickiness.enabled", value: "true" },
            { key: "deregistration_delay.timeout_seconds", value: "30" },
          ],
        }),
      );

      const tg = stack.get(TARGET_GROUP, "ns/gw:ns-route:HTTPRoute-ns-svc:8080");
      expect(tg?.spec.name).toBe("custom-tg");
      expect(tg?.spec.targetGroupAttributes).toEqual([
        { key: "deregistration_delay.timeout_seconds", value: "30" },
        { key: "stickiness.enabled", value: "true" },
      ]);
      expect(builder.targetGroupNameToARN().get("custom-tg")).toEqual(
        targetGroupARN("ns/gw:ns-route:HTTPRoute-ns-svc:8080"),
      );
    });

    test("rejects instance targets without a node port", async () => {
      const clusterIP = testService("svc", [{ port: 80, targetPort: 8080 }], { type: "ClusterIP" });
      const { build } = setup();
      const result = await build("HTTPRoute", backendFor(clusterIP));

      expect(result._unsafeUnwrapErr().message).toBe(
        "TargetGroup port is empty. When using Instance targets, your service must be of type 'NodePort' or 'LoadBalancer'",
      );
    });

    test("rejects a layer 4 protocol override on application load balancers", async () => {
      const { build } = setup();
      const result = await build("HTTPRoute", backendFor(service, { protocol: "TCP" }));
      expect(result._unsafeUnwrapErr().message).toBe("backend protocol must be within [HTTP, HTTPS]: TCP");
    });

    test("rejects IPv6 services behind IPv4 load balancers", async () => {
      const ipv6 = testService("svc", [testServicePort(80, 30080, 8080)], { ipFamilies: ["IPv6"] });
      const { build } = setup();
      const result = await build("HTTPRoute", backendFor(ipv6));
      expect(result._unsafeUnwrapErr().message).toBe("unsupported IPv6 configuration, lb not dual-stack");
    });

    test("rejects a named health check port when the target port is named", async () => {
      const named = testService("svc", [
        { name: "http", port: 80, targetPort: "web", nodePort: 30080 },
      ]);
      const { build } = setup();
      const result = await build(
        "HTTPRoute",
        backendFor(named, { targetType: "ip", healthCheckConfig: { healthCheckPort: "http" } }),
      );
      expect(result._unsafeUnwrapErr().message).toBe(
        "cannot use named healthCheckPort for IP TargetType when service's targetPort is a named port",
      );
    });
  });

  describe("literal target group backends", () => {
    test("resolves the ARN by name", async () => {
      const { builder, build, stack } = setup();
      const result = await build("HTTPRoute", {
        kind: "literalTargetGroup",
        weight: 1,
        targetGroupName: "existing-tg",
      });

      expect(result._unsafeUnwrap()).toEqual(literal("arn:aws:test:tg/existing"));
      expect(builder.targetGroupNameToARN().get("existing-tg")).toEqual(literal("arn:aws:test:tg/existing"));
      expect(stack.size).toBe(0);
    });

    test("reports unknown names", async () => {
      const { build } = setup();
      const result = await build("HTTPRoute", { kind: "literalTargetGroup", weight: 1, targetGroupName: "nope" });
      expect(result._unsafeUnwrapErr().message).toBe("resolve target group nope: target group nope not found");
    });
  });

  describe("gateway backends", () => {
    const albBackend: Backend = {
      kind: "gateway",
      weight: 1,
      gateway: { namespace: "ns", name: "alb-gw" },
      albARN: "arn:aws:test:loadbalancer/app/alb",
      listenerPort: 443,
    };

    test("targets the application load balancer from a network load balancer", async () => {
      const { builder, stack, build } = setup("network");
      const resID = "ns/gw:ns-route:TCPRoute-ns-alb-gw:443";

      const result = await build("TCPRoute", albBackend);
      expect(result._unsafeUnwrap()).toEqual(targetGroupARN(resID));

      const tg = stack.get(TARGET_GROUP, resID);
      expect(tg?.spec.targetType).toBe("alb");
      expect(tg?.spec.port).toBe(443);
      expect(tg?.spec.protocol).toBe("TCP");
      expect(tg?.spec.healthCheckConfig.port).toBe("traffic-port");
      expect(tg?.spec.healthCheckConfig.protocol).toBe("HTTP");
      expect(stack.list(TARGET_GROUP_BINDING)).toHaveLength(0);
      expect(builder.frontendNlbTargets()).toEqual([
        {
          targetGroupName: tg?.spec.name,
          albARN: "arn:aws:test:loadbalancer/app/alb",
          port: 80,
          targetPort: 443,
        },
      ]);
    });

    test("is rejected on application load balancers", async () => {
      const { build } = setup("application");
      const result = await build("HTTPRoute", albBackend);
      expect(result._unsafeUnwrapErr().message).toBe(
        "gateway backends are only supported on network load balancers",
      );
    });
  });
});
