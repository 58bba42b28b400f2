#!/usr/bin/env node

import { Command, Option } from "commander";
import path from "node:path";
import { converge } from "./commands/converge.js";
import { validateAll } from "./commands/validate.js";
import { status, listRuns, resolveRunsDir } from "./commands/status.js";
import { EXIT } from "./commands/exit-codes.js";
import { formatFatal, type OutputFormat } from "./core/reporter.js";

const program = new Command();

const formatOption = () =>
  new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human");

program
  .name("convergectl")
  .description("Drive the build-and-deploy control plane until a revision is live")
  .version("0.1.0");

// Format of the command being run, for errors that escape its action.
let outputFormat: OutputFormat = "human";
program.hook("preAction", (_program, actionCommand) => {
  const format: unknown = actionCommand.opts().format;
  if (format === "jsonl" || format === "human") outputFormat = format;
});

program
  .command("converge")
  .description("Build and deploy a revision, then wait until it is the live one")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay to apply (config/<name>.yaml)")
  .option("--revision <sha>", "Target revision (default: git HEAD of repo_dir)")
  .option("--no-push", "Skip git push before building")
  .option("--force", "Start even if another run for this service looks active")
  .addOption(formatOption())
  .action(
    async (opts: { config?: string; env?: string; revision?: string; push: boolean; force?: boolean; format: OutputFormat }) => {
      const controller = new AbortController();
      const abort = () => controller.abort(new Error("interrupted"));
      process.once("SIGINT", abort);
      process.once("SIGTERM", abort);

      const res = await converge({
        configDir: opts.config,
        envName: opts.env,
        revision: opts.revision,
        push: opts.push,
        force: opts.force,
        format: opts.format,
        signal: controller.signal,
      });

      process.off("SIGINT", abort);
      process.off("SIGTERM", abort);

      if (!res.ok) {
        if (opts.format === "jsonl") {
          for (const d of res.diagnostics ?? []) process.stdout.write(JSON.stringify(d) + "\n");
          process.stdout.write(formatFatal("jsonl", res.error, { exitCode: res.exitCode, runId: res.runId }) + "\n");
        } else if (res.finalState === undefined) {
          // Failures after the run started were already reported by the orchestrator.
          console.error(formatFatal("human", res.error));
        }
        process.exitCode = res.exitCode;
        return;
      }

      if (opts.format === "jsonl") {
        process.stdout.write(JSON.stringify({ level: "info", code: "EXIT", exitCode: 0, runId: res.runId }) + "\n");
      }
    },
  );

program
  .command("validate")
  .description("Validate layered configuration")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay to apply")
  .addOption(formatOption())
  .action((opts: { config?: string; env?: string; format: OutputFormat }) => {
    const res = validateAll({ configDir: opts.config, envName: opts.env });

    if (!res.ok) {
      if (opts.format === "jsonl") {
        for (const err of res.errors) process.stdout.write(JSON.stringify(err) + "\n");
      } else {
        for (const err of res.errors) console.error(err.message);
      }
      process.exitCode = EXIT.INVALID_ARGS;
      return;
    }

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ level: "info", code: "OK", message: "OK" }) + "\n");
    } else {
      console.log("OK");
    }
  });

program
  .command("status")
  .description("Show run records")
  .argument("[runId]", "Run id (omit to list all)")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay to apply")
  .option("--runs-dir <path>", "Runs directory (overrides runs_dir from config)")
  .addOption(formatOption())
  .action((runId: string | undefined, opts: { config?: string; env?: string; runsDir?: string; format: OutputFormat }) => {
    const runsDir = path.resolve(opts.runsDir ?? resolveRunsDir({ configDir: opts.config, envName: opts.env }));

    if (runId) {
      const res = status({ runsDir, runId });
      if (!res.ok) {
        if (opts.format === "jsonl") {
          process.stdout.write(JSON.stringify({ level: "error", error: res.error }) + "\n");
        } else {
          console.error(res.error);
        }
        process.exitCode = EXIT.UNEXPECTED;
        return;
      }
      if (opts.format === "jsonl") {
        process.stdout.write(JSON.stringify(res.record) + "\n");
      } else {
        console.log(JSON.stringify(res.record, null, 2));
      }
      return;
    }

    const list = listRuns(runsDir);
    if (opts.format === "jsonl") {
      for (const item of list) process.stdout.write(JSON.stringify(item) + "\n");
    } else {
      if (list.length === 0) { console.log("No runs found."); return; }
      for (const item of list) console.log(`${item.runId}  ${item.state}  ${item.revision ?? "-"}  ${item.updatedAt}`);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(formatFatal(outputFormat, message, { exitCode: EXIT.UNEXPECTED }) + "\n");
  process.exit(EXIT.UNEXPECTED);
});
