#!/usr/bin/env node

import { Command, CommanderError, Option } from "commander";
import { runCheck } from "./commands/check.js";
import { validateAll } from "./commands/validate.js";
import { EXIT } from "./commands/exit-codes.js";
import { formatReport, type ReportFormat } from "./report/emitter.js";

const program = new Command();

program
  .name("lockstep")
  .description("Print the edits that keep sibling checkouts on the same revisions")
  .version("0.1.0")
  .exitOverride();

const formatOption = () =>
  new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human");

program
  .command("check", { isDefault: true })
  .description("Compare manifests against local checkouts and the artifact registry")
  .option("--root <path>", "Directory containing the repository checkouts", process.cwd())
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config environment layered over base.yaml")
  .option("--consumer <name>", "Repository whose package manifest is reconciled")
  .option("--verbose", "Log progress to stderr")
  .addOption(formatOption())
  .action(
    async (opts: { root: string; config?: string; env?: string; consumer?: string; verbose?: boolean; format: ReportFormat }) => {
      const res = await runCheck({
        root: opts.root,
        configDir: opts.config,
        envName: opts.env,
        consumer: opts.consumer,
        verbose: opts.verbose,
      });

      if (!res.ok) {
        if (opts.format === "jsonl") {
          process.stdout.write(JSON.stringify({ level: "error", code: res.error.code, message: res.error.message }) + "\n");
        } else {
          console.error(res.error.message);
        }
        process.exit(res.error.code === "INVALID_CONFIG" ? EXIT.INVALID_CONFIG : EXIT.IO_ERROR);
      }

      for (const line of formatReport(res.report, res.root, opts.format)) {
        process.stdout.write(line + "\n");
      }
    }
  );

program
  .command("validate")
  .description("Validate the layered configuration")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config environment layered over base.yaml")
  .addOption(formatOption())
  .action((opts: { config?: string; env?: string; format: ReportFormat }) => {
    const res = validateAll({ configDir: opts.config, envName: opts.env });
    const diagnostics = res.ok ? res.warnings : res.errors;

    if (opts.format === "jsonl") {
      for (const d of diagnostics) process.stdout.write(JSON.stringify(d) + "\n");
    } else {
      for (const d of diagnostics) console.error(d.message);
    }

    if (!res.ok) process.exit(EXIT.INVALID_CONFIG);

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK" }) + "\n");
    } else {
      console.log("OK");
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof CommanderError) {
    process.exit(err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS);
  }
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.IO_ERROR);
});
