import { ok, err, type Result } from "neverthrow";
import { z } from "zod";
import * as fs from "node:fs/promises";
import { existsSync } from "node:fs";

const FeatureGatesSchema = z.object({
  nlbSecurityGroup: z.boolean().default(true),
});

export const ControllerConfigSchema = z.object({
  clusterName: z.string().min(1),
  vpcID: z.string().min(1),
  defaultSSLPolicy: z.string().default("ELBSecurityPolicy-2016-08"),
  defaultTargetType: z.enum(["instance", "ip"]).default("instance"),
  defaultLoadBalancerScheme: z.enum(["internal", "internet-facing"]).default("internal"),
  defaultTags: z.record(z.string(), z.string()).default({}),
  externalManagedTags: z.array(z.string()).default([]),
  tagPrecedence: z.enum(["defaultsWin", "overrideWins"]).default("overrideWins"),
  enableBackendSG: z.boolean().default(true),
  disableRestrictedSGRules: z.boolean().default(false),
  featureGates: FeatureGatesSchema.default({}),
});

export type ControllerConfig = Readonly<z.infer<typeof ControllerConfigSchema>>;
export type FeatureGates = z.infer<typeof FeatureGatesSchema>;

export type ConfigError = {
  readonly field: string;
  readonly message: string;
};

export const readControllerConfig = async (
  path: string,
): Promise<Result<ControllerConfig, ConfigError>> => {
  if (!existsSync(path)) {
    return err({ field: "path", message: `Config file not found: ${path}` });
  }

  const text = await fs.readFile(path, "utf-8");
  const parsed = parseJson(text);
  if (parsed.isErr()) {
    return err(parsed.error);
  }

  return parseControllerConfig(parsed.value);
};

export const parseControllerConfig = (parsed: unknown): Result<ControllerConfig, ConfigError> => {
  const result = ControllerConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    if (issue !== undefined) {
      return err({ field: issue.path.join(".") || "root", message: issue.message });
    }
    return err({ field: "root", message: "Invalid config" });
  }
  return ok(Object.freeze(result.data));
};

export const validateControllerConfig = (config: unknown): readonly ConfigError[] => {
  const result = parseControllerConfig(config);
  if (result.isErr()) {
    return [result.error];
  }
  return [];
};

export const parseJson = (text: string): Result<unknown, ConfigError> => {
  try {
    const value: unknown = JSON.parse(text);
    return ok(value);
  } catch (e) {
    return err({ field: "root", message: e instanceof Error ? e.message : String(e) });
  }
};
