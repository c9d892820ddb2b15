import { ok, err, type Result } from "neverthrow";
import { z } from "zod";
import * as fs from "node:fs/promises";
import { existsSync } from "node:fs";
import { formatBuildError, type BuildError } from "../core/errors.js";
import { createConsoleLogger } from "../core/logger.js";
import { tokenToString } from "../core/tokens.js";
import { parseJson, readControllerConfig, type ConfigError } from "../config/index.js";
import { createModelBuilder } from "../gateway/model-builder.js";
import { namespacedNameKey } from "../gateway/inputs.js";
import { loadScenario } from "../testing/scenario.js";

export const DEFAULT_CONFIG_PATH = "gwlb.json";

const LoadBalancerTypeSchema = z.enum(["application", "network"]);
const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export type BuildOptions = {
  readonly scenarioPath: string;
  readonly configPath?: string;
  readonly type?: string;
  readonly logLevel?: string;
};

export type BuildCommandError =
  | { readonly kind: "config"; readonly error: ConfigError }
  | { readonly kind: "io"; readonly message: string }
  | { readonly kind: "build"; readonly error: BuildError };

export type RenderedModel = {
  readonly stack: Record<string, Record<string, unknown>>;
  readonly backendSecurityGroupAllocated: boolean;
  readonly secretKeys: readonly string[];
  readonly targetGroupNameToArn: Record<string, string>;
};

const readScenario = async (path: string): Promise<Result<unknown, BuildCommandError>> => {
  if (!existsSync(path)) {
    return err({ kind: "io", message: `Scenario file not found: ${path}` });
  }
  const text = await fs.readFile(path, "utf-8");
  const parsed = parseJson(text);
  if (parsed.isErr()) {
    return err({ kind: "config", error: parsed.error });
  }
  return ok(parsed.value);
};

export const runBuild = async (
  options: BuildOptions,
): Promise<Result<RenderedModel, BuildCommandError>> => {
  const lbType = LoadBalancerTypeSchema.safeParse(options.type ?? "application");
  if (!lbType.success) {
    return err({ kind: "config", error: { field: "type", message: `unknown load balancer type: ${String(options.type)}` } });
  }
  const logLevel = LogLevelSchema.safeParse(options.logLevel ?? "info");
  if (!logLevel.success) {
    return err({ kind: "config", error: { field: "log-level", message: `unknown log level: ${String(options.logLevel)}` } });
  }

  const config = await readControllerConfig(options.configPath ?? DEFAULT_CONFIG_PATH);
  if (config.isErr()) {
    return err({ kind: "config", error: config.error });
  }

  const raw = await readScenario(options.scenarioPath);
  if (raw.isErr()) {
    return err(raw.error);
  }
  const scenario = loadScenario(raw.value);
  if (scenario.isErr()) {
    return err({ kind: "build", error: scenario.error });
  }

  const builder = createModelBuilder({
    config: config.value,
    loadBalancerType: lbType.data,
    collaborators: scenario.value.collaborators,
    logger: createConsoleLogger(logLevel.data),
  });
  const built = await builder.build(scenario.value.input);
  if (built.isErr()) {
    return err({ kind: "build", error: built.error });
  }

  const nameToArn: Record<string, string> = {};
  for (const [name, token] of built.value.targetGroupNameToArn) {
    nameToArn[name] = tokenToString(token);
  }
  return ok({
    stack: built.value.stack.toJSON(),
    backendSecurityGroupAllocated: built.value.backendSecurityGroupAllocated,
    secretKeys: built.value.secretKeys.map(namespacedNameKey),
    targetGroupNameToArn: nameToArn,
  });
};

export const formatBuildCommandError = (error: BuildCommandError): string => {
  switch (error.kind) {
    case "config":
      return `Config error in ${error.error.field}: ${error.error.message}`;
    case "io":
      return error.message;
    case "build":
      return formatBuildError(error.error);
  }
};

export const build = async (options: BuildOptions): Promise<number> => {
  const result = await runBuild(options);
  if (result.isErr()) {
    console.error(`Error: ${formatBuildCommandError(result.error)}`);
    return 1;
  }
  console.log(JSON.stringify(result.value, null, 2));
  return 0;
};
