import type { z } from "zod";
import { ControllerConfigSchema, type ControllerConfig } from "../config/index.js";
import type { Gateway, GatewayListener, Service, ServicePort } from "../gateway/inputs.js";

export const TEST_CLUSTER = "test-cluster";
export const TEST_VPC = "vpc-test";

export const testControllerConfig = (
  overrides: Partial<z.input<typeof ControllerConfigSchema>> = {},
): ControllerConfig =>
  Object.freeze(ControllerConfigSchema.parse({ clusterName: TEST_CLUSTER, vpcID: TEST_VPC, ...overrides }));

export const testGateway = (
  listeners: readonly GatewayListener[],
  metadata: Partial<Gateway["metadata"]> = {},
): Gateway => ({
  metadata: { namespace: "ns", name: "gw", uid: "uid-1", ...metadata },
  spec: { listeners: [...listeners] },
});

export const testListener = (
  port: number,
  protocol: GatewayListener["protocol"],
  extra: Partial<GatewayListener> = {},
): GatewayListener => ({ name: `${protocol.toLowerCase()}-${port}`, port, protocol, ...extra });

export const testService = (
  name: string,
  ports: readonly ServicePort[],
  spec: Partial<Omit<Service["spec"], "ports">> = {},
): Service => ({
  metadata: { namespace: "ns", name },
  spec: { type: "NodePort", ...spec, ports: [...ports] },
});

export const testServicePort = (port: number, nodePort: number, targetPort: number | string = port): ServicePort => ({
  port,
  targetPort,
  nodePort,
  protocol: "TCP",
});
