#!/usr/bin/env node
import { Command } from "commander";
import { check_command, run_command, type CliCheckOptions } from "./commands";
import type { CliRunOptions } from "./config";

const program = new Command();

program
  .name("crawl")
  .description("Run scripts of dice checks, random tables and facts")
  .version("0.1.0");

program
  .command("run")
  .argument("<script>", "path to a .crawl script")
  .option("-p, --procedure <name>", "run this procedure instead of the top-level statements")
  .option("-s, --seed <n>", "seed for reproducible rolls")
  .option("-t, --tables <dir>", "directory table names resolve against (default: the script's directory)")
  .option("-f, --facts <file>", "persistent fact file (default: .crawl-facts.json next to the script)")
  .option("--max-depth <n>", "procedure call depth limit")
  .option("--max-steps <n>", "executed statement limit")
  .option("-c, --config <file>", "JSON config file")
  .option("--log-level <level>", "debug | info | warn | error | silent")
  .option("--json", "print the run result as JSON", false)
  .action(async (script: string, opts: CliRunOptions) => {
    process.exitCode = await run_command(script, opts);
  });

program
  .command("check")
  .argument("<script>", "path to a .crawl script")
  .option("--strict", "treat warnings as errors", false)
  .option("-o, --out <file>", "write the compile output as JSON")
  .action(async (script: string, opts: CliCheckOptions) => {
    process.exitCode = await check_command(script, opts);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`💥 ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
