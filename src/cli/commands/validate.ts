import { command } from "cleye";
import { validate } from "../validate.js";

export const validateCommand = command(
  {
    name: "validate",
    help: {
      description: "Check a controller config file",
    },
    flags: {
      config: {
        type: String,
        description: "Controller config file (default: gwlb.json)",
      },
    },
  },
  async (argv) => {
    process.exitCode = await validate({ configPath: argv.flags.config });
  },
);
