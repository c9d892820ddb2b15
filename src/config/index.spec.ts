import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  parseControllerConfig,
  parseJson,
  readControllerConfig,
  validateControllerConfig,
} from "./index.js";

describe("parseControllerConfig", () => {
  test("fills in defaults", () => {
    const result = parseControllerConfig({ clusterName: "test-cluster", vpcID: "vpc-1" });
    const config = result._unsafeUnwrap();
    expect(config.defaultLoadBalancerScheme).toBe("internal");
    expect(config.defaultTargetType).toBe("instance");
    expect(config.tagPrecedence).toBe("overrideWins");
    expect(config.enableBackendSG).toBe(true);
    expect(config.featureGates).toEqual({ nlbSecurityGroup: true });
  });

  test("reports the first invalid field", () => {
    const result = parseControllerConfig({ clusterName: "test-cluster", vpcID: "vpc-1", defaultTargetType: "pod" });
    expect(result._unsafeUnwrapErr().field).toBe("defaultTargetType");
  });

  test("requires a cluster name", () => {
    expect(validateControllerConfig({ vpcID: "vpc-1" }).map((e) => e.field)).toEqual(["clusterName"]);
  });
});

describe("parseJson", () => {
  test("reports malformed JSON at the root", () => {
    expect(parseJson("{").isErr()).toBe(true);
    expect(parseJson("{").mapErr((e) => e.field)._unsafeUnwrapErr()).toBe("root");
  });
});

describe("readControllerConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "gwlb-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("reads a config file", async () => {
    const path = join(dir, "gwlb.json");
    await writeFile(path, JSON.stringify({ clusterName: "test-cluster", vpcID: "vpc-1" }));
    const result = await readControllerConfig(path);
    expect(result._unsafeUnwrap().clusterName).toBe("test-cluster");
  });

  test("reports a missing file", async () => {
    const path = join(dir, "missing.json");
    const result = await readControllerConfig(path);
    expect(result._unsafeUnwrapErr()).toEqual({ field: "path", message: `Config file not found: ${path}` });
  });
});
