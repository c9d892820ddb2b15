import { ok, err, type Result } from "neverthrow";
import { readControllerConfig, type ConfigError, type ControllerConfig } from "../config/index.js";
import { DEFAULT_CONFIG_PATH } from "./build.js";

export type ValidateOptions = {
  readonly configPath?: string;
};

export const runValidate = async (
  options: ValidateOptions,
): Promise<Result<ControllerConfig, ConfigError>> => {
  const config = await readControllerConfig(options.configPath ?? DEFAULT_CONFIG_PATH);
  if (config.isErr()) {
    return err(config.error);
  }
  return ok(config.value);
};

export const validate = async (options: ValidateOptions): Promise<number> => {
  const result = await runValidate(options);
  if (result.isErr()) {
    console.error(`Config error in ${result.error.field}: ${result.error.message}`);
    return 1;
  }
  console.log(`Configuration for cluster ${result.value.clusterName} is valid`);
  return 0;
};
