import { Command } from "commander";
import { ConfigError, loadConfig } from "@/lib/config";
import { describeRules } from "@/lib/rules-registry";

export const rulesCommand = new Command("rules")
  .description("List the detection rules and their effective thresholds")
  .option("-c, --config <path>", "Path to configuration file (default: config.json)")
  .action(async (options: { config?: string }) => {
    try {
      const config = await loadConfig(options.config);
      console.log(describeRules(config));
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error;
      console.error(`Error: ${error.message}`);
      process.exitCode = 1;
    }
  });
