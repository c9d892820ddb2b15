import { command } from "cleye";
import { build } from "../build.js";

export const buildCommand = command(
  {
    name: "build",
    parameters: ["<scenario>"],
    help: {
      description: "Compile a Gateway scenario into load balancer resources",
    },
    flags: {
      config: {
        type: String,
        description: "Controller config file (default: gwlb.json)",
      },
      type: {
        type: String,
        description: "Load balancer type: application or network (default: application)",
      },
      logLevel: {
        type: String,
        description: "debug, info, warn or error (default: info)",
      },
    },
  },
  async (argv) => {
    process.exitCode = await build({
      scenarioPath: argv._.scenario,
      configPath: argv.flags.config,
      type: argv.flags.type,
      logLevel: argv.flags.logLevel,
    });
  },
);
