import { Command, Option } from "commander";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { LOG_LEVEL_ENV, resolveAnalyzeConfig, type AnalyzeCliOptions } from "./application/config.js";
import { createStderrLogger, parseLogLevel, type LogLevel } from "./application/logger.js";
import { runAnalyzeCommand } from "./application/run-analyze-command.js";

const program = new Command();
const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "../package.json");
const { version } = JSON.parse(readFileSync(packageJsonPath, "utf8")) as { version: string };

program
  .name("commitlens")
  .description("Line-level impact report of the initial and merge commits of a Bitbucket Server branch")
  .version(version);

program
  .command("analyze")
  .requiredOption("--url <url>", "Bitbucket server URL, e.g. https://bitbucket.example.com")
  .requiredOption("--project <key>", "Bitbucket project key")
  .requiredOption("--repo <slug>", "repository slug")
  .requiredOption("--branch <name>", "branch to analyze")
  .option("--username <name>", "Bitbucket username (default: $COMMITLENS_USERNAME)")
  .option("--password <secret>", "Bitbucket password or token (default: $COMMITLENS_PASSWORD)")
  .addOption(
    new Option("--format <mode>", "output format: text or json")
      .choices(["text", "json"])
      .default("text"),
  )
  .option("--output <file>", "write the report to a file instead of stdout")
  .option("--exclude <extensions...>", "file extensions left out of line counts (e.g. .png jpg)")
  .option("--no-cumulative", "report each commit instead of per-author and running totals")
  .option("--utc", "render dates in UTC instead of local time")
  .option("--file-concurrency <count>", "file diffs fetched in parallel per commit", "1")
  .addOption(
    new Option(
      "--log-level <level>",
      "log verbosity: silent, error, warn, info, debug (logs are written to stderr)",
    )
      .choices(["silent", "error", "warn", "info", "debug"])
      .default(parseLogLevel(process.env[LOG_LEVEL_ENV])),
  )
  .option("--verbose", "shortcut for --log-level debug")
  .action(async (options: AnalyzeCliOptions & { logLevel: LogLevel; verbose?: boolean }) => {
    const logger = createStderrLogger(options.verbose === true ? "debug" : options.logLevel);

    try {
      const config = resolveAnalyzeConfig(options, process.env);
      const { rendered } = await runAnalyzeCommand(config, logger);
      if (config.outputPath === null) {
        process.stdout.write(`${rendered}\n`);
      }
    } catch (error) {
      logger.error(error instanceof Error ? `${error.name}: ${error.message}` : String(error));
      process.exitCode = 1;
    }
  });

if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

const executablePath = process.argv[0] ?? "";
const scriptPath = process.argv[1] ?? "";

const argv =
  process.argv[2] === "--"
    ? [executablePath, scriptPath, ...process.argv.slice(3)]
    : process.argv;

if (argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

await program.parseAsync(argv);
