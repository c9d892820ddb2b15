import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { tokenToString } from "../core/tokens.js";
import { LOAD_BALANCER, TARGET_GROUP, targetGroupARN } from "../model/index.js";
import { formatBuildCommandError, runBuild } from "./build.js";

const scenario = {
  gateway: {
    metadata: { namespace: "ns", name: "gw", uid: "uid-1" },
    spec: { listeners: [{ name: "http", port: 80, protocol: "HTTP" }] },
  },
  services: [
    {
      metadata: { namespace: "ns", name: "svc" },
      spec: { type: "NodePort", ports: [{ port: 80, targetPort: 8080, nodePort: 30080 }] },
    },
  ],
  routes: [
    {
      kind: "HTTPRoute",
      namespace: "ns",
      name: "web",
      ports: [80],
      rules: [{ backends: [{ kind: "service", name: "svc", port: 80 }] }],
    },
  ],
  cloud: {
    subnets: [
      { subnetID: "subnet-a", cidrBlock: "10.0.0.0/24", tags: { "kubernetes.io/role/internal-elb": "1" } },
    ],
    backendSecurityGroupID: "sg-backend",
  },
};

describe("runBuild", () => {
  let dir: string;
  let configPath: string;
  let scenarioPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "gwlb-build-"));
    configPath = join(dir, "gwlb.json");
    scenarioPath = join(dir, "scenario.json");
    await writeFile(configPath, JSON.stringify({ clusterName: "test-cluster", vpcID: "vpc-test" }));
    await writeFile(scenarioPath, JSON.stringify(scenario));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("renders the compiled stack", async () => {
    const result = await runBuild({ scenarioPath, configPath, logLevel: "error" });
    const rendered = result._unsafeUnwrap();
    const resID = "ns/gw:ns-web:HTTPRoute-ns-svc:8080";

    expect(rendered.backendSecurityGroupAllocated).toBe(true);
    expect(rendered.secretKeys).toEqual([]);
    expect(Object.keys(rendered.stack[LOAD_BALANCER] ?? {})).toEqual(["LoadBalancer"]);
    expect(Object.keys(rendered.stack[TARGET_GROUP] ?? {})).toEqual([resID]);
    expect(Object.values(rendered.targetGroupNameToArn)).toEqual([tokenToString(targetGroupARN(resID))]);
  });

  test("rejects an unknown load balancer type", async () => {
    const result = await runBuild({ scenarioPath, configPath, type: "gateway" });
    expect(formatBuildCommandError(result._unsafeUnwrapErr())).toBe(
      "Config error in type: unknown load balancer type: gateway",
    );
  });

  test("reports a missing config file", async () => {
    const missing = join(dir, "absent.json");
    const result = await runBuild({ scenarioPath, configPath: missing });
    expect(result._unsafeUnwrapErr()).toEqual({
      kind: "config",
      error: { field: "path", message: `Config file not found: ${missing}` },
    });
  });

  test("reports a missing scenario file", async () => {
    const missing = join(dir, "absent.json");
    const result = await runBuild({ scenarioPath: missing, configPath });
    expect(result._unsafeUnwrapErr()).toEqual({ kind: "io", message: `Scenario file not found: ${missing}` });
  });

  test("surfaces build errors", async () => {
    await writeFile(scenarioPath, JSON.stringify({ ...scenario, cloud: { ...scenario.cloud, backendSecurityGroupID: undefined } }));
    const result = await runBuild({ scenarioPath, configPath, logLevel: "error" });
    expect(formatBuildCommandError(result._unsafeUnwrapErr())).toBe(
      "get backend security group: backend security group is not available",
    );
  });
});
