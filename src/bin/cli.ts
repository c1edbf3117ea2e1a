#!/usr/bin/env node

import { Command } from "commander";
import { run } from "../index.js";

interface RunCommandOptions {
  config?: string;
  outDir: string;
  state: string;
  manual: string;
  probe: boolean;
  verbose?: boolean;
}

const program = new Command();

program
  .name("transport-tracker")
  .description("Track transportation contracts, jobs and partnerships for one state")
  .version("1.0.0");

program
  .command("run")
  .description("Fetch all sources, write the report and exports, and update seen state")
  .option("--config <path>", "Configuration file (default: $TRACKER_CONFIG or config.json)")
  .option("--out-dir <path>", "Output directory for index.html and exports", "docs")
  .option("--state <path>", "Seen-opportunities state file", "seen_opportunities.json")
  .option("--manual <path>", "Manual opportunities file", "manual_opportunities.json")
  .option("--no-probe", "Skip directory reachability checks")
  .option("--verbose", "Verbose logging")
  .action(async (options: RunCommandOptions) => {
    try {
      const result = await run({
        configPath: options.config,
        outDir: options.outDir,
        statePath: options.state,
        manualPath: options.manual,
        probe: options.probe,
        verbose: options.verbose || false,
      });

      console.log("\n✅ Run completed successfully!");
      console.log(`   Total opportunities: ${result.total}`);
      for (const [source, summary] of Object.entries(result.sources)) {
        console.log(`   ${source}: ${summary.count} (${summary.new} new)`);
      }
      console.log(
        `   High relevance: ${result.relevance.high} | Medium: ${result.relevance.medium} | Low: ${result.relevance.low}`
      );
      console.log(`   Report: ${result.outputs.html}`);
      console.log(`   Duration: ${(result.durationMs / 1000).toFixed(2)}s`);

      process.exit(0);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error("\n❌ Run failed:", message);
      process.exit(1);
    }
  });

program.parse();
