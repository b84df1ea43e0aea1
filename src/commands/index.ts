import { Command } from "commander";
import { analyzeCommand } from "./analyze";
import { rulesCommand } from "./rules";

export function createProgram(): Command {
  return new Command()
    .name("authwatch")
    .description("Detect brute-force and username-enumeration attempts in authentication logs")
    .version("0.1.0")
    .addCommand(analyzeCommand)
    .addCommand(rulesCommand);
}
