import { cli } from "cleye";
import { buildCommand } from "./commands/build.js";
import { validateCommand } from "./commands/validate.js";

export const VERSION = "0.1.0";

export const run = (argv: string[]): void => {
  cli(
    {
      name: "gwlb",
      version: VERSION,
      commands: [buildCommand, validateCommand],
    },
    (parsed) => {
      parsed.showHelp();
    },
    argv,
  );
};
