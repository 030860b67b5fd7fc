#!/usr/bin/env node
import { pathToFileURL } from "node:url";
import * as clack from "@clack/prompts";
import { Command } from "commander";
import { collectOption, parsePositiveIntOption } from "./cli/option-parsers.js";
import { runAuditCommand, runNamesCommand, runStatsCommand, type NamesCommandOptions } from "./commands/audit.js";
import { runDeleteCommand, runPruneCommand } from "./commands/delete.js";
import { runLinkFilesCommand, type LinkFilesCommandOptions } from "./commands/link-files.js";
import { runLinkLabelsCommand, type LinkLabelsCommandOptions } from "./commands/link-labels.js";
import {
  runCleanTitlesCommand,
  runRenameCommand,
  runRenameMagazinesCommand,
  type RenameCommandOptions,
} from "./commands/rename.js";
import type { StoreCommandOptions } from "./commands/shared.js";
import { runTagCountryCommand } from "./commands/tag-country.js";
import {
  runUnlinkBrokenCommand,
  runUnlinkCommand,
  type UnlinkBrokenCommandOptions,
  type UnlinkCommandOptions,
} from "./commands/unlink.js";
import { readConfig, resolveApiKey, resolveConfigPath } from "./config.js";
import { banner, formatLabel, ui } from "./ui.js";
import { APP_VERSION } from "./version.js";

function stderrLine(message: string): void {
  process.stderr.write(`${message}\n`);
}

function withStoreOptions(command: Command): Command {
  return command
    .option("--dry-run", "Preview the planned changes without writing", false)
    .option("--cap <n>", "Maximum records returned by the scan (1-10000)", parsePositiveIntOption)
    .option("--namespace <ns>", "Index namespace to operate on");
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("vecmend")
    .description("Reconcile vector index metadata against ground truth")
    .version(APP_VERSION)
    .action(() => {
      const config = readConfig(process.env);
      clack.intro(banner());
      clack.note(
        [
          formatLabel("Config", resolveConfigPath(process.env)),
          formatLabel("Index", config.index),
          formatLabel("Namespace", config.namespace ?? "(default)"),
          formatLabel("API key", resolveApiKey(process.env) ? "set" : "not set"),
        ].join("\n"),
        "Target",
      );
      if (!resolveApiKey(process.env)) {
        clack.log.warn("Set " + ui.bold("PINECONE_API_KEY") + " before running a pass.");
      }
      program.outputHelp();
      clack.outro();
    });

  withStoreOptions(program.command("stats").description("Show index stats and check scan coverage")).action(
    async (opts: StoreCommandOptions) => {
      const result = await runStatsCommand(opts);
      process.exitCode = result.exitCode;
    },
  );

  withStoreOptions(
    program
      .command("names")
      .description("List display name, type and brand of scanned records")
      .option("--limit <n>", "Number of records to list", parsePositiveIntOption, 50)
      .option("--type <type>", "Only list records of this document type"),
  ).action(async (opts: NamesCommandOptions) => {
    const result = await runNamesCommand(opts);
    process.exitCode = result.exitCode;
  });

  withStoreOptions(program.command("audit").description("Classify scanned sources by copyright risk")).action(
    async (opts: StoreCommandOptions) => {
      const result = await runAuditCommand(opts);
      process.exitCode = result.exitCode;
    },
  );

  withStoreOptions(
    program
      .command("link-labels")
      .description("Attach label URLs from ground-truth label files to matching pesticide records")
      .option("--dir <path>", "Directory of label .txt files"),
  ).action(async (opts: LinkLabelsCommandOptions) => {
    const result = await runLinkLabelsCommand(opts);
    process.exitCode = result.exitCode;
  });

  withStoreOptions(
    program
      .command("link-files")
      .description("Set pdf_path on product records from the closest-named .pdf or .txt file")
      .option("--dir <path>", "Document folder to search (repeatable)", collectOption),
  ).action(async (opts: LinkFilesCommandOptions) => {
    const result = await runLinkFilesCommand(opts);
    process.exitCode = result.exitCode;
  });

  withStoreOptions(
    program
      .command("unlink")
      .description("Remove disallowed link fields while keeping protected manufacturer links")
      .option("--domain <domain>", "Disallowed link domain (repeatable)", collectOption)
      .option("--extension <ext>", "Disallowed link file extension (repeatable)", collectOption),
  ).action(async (opts: UnlinkCommandOptions) => {
    const result = await runUnlinkCommand(opts);
    process.exitCode = result.exitCode;
  });

  withStoreOptions(
    program
      .command("unlink-broken")
      .description("Check every record link and remove the ones that are dead")
      .option("--timeout <ms>", "Per-link request timeout in milliseconds", parsePositiveIntOption),
  ).action(async (opts: UnlinkBrokenCommandOptions) => {
    const result = await runUnlinkBrokenCommand(opts);
    process.exitCode = result.exitCode;
  });

  withStoreOptions(
    program.command("tag-country").description("Tag pesticide records with the countries they are registered in"),
  ).action(async (opts: StoreCommandOptions) => {
    const result = await runTagCountryCommand(opts);
    process.exitCode = result.exitCode;
  });

  withStoreOptions(
    program
      .command("rename")
      .description("Rename every record whose name contains a fragment")
      .argument("<fragment>", "Case-insensitive name fragment to search for")
      .argument("<name>", "New display name")
      .option("--type <type>", "Also set the document type")
      .option("--brand <brand>", "Also set the brand"),
  ).action(async (fragment: string, name: string, opts: RenameCommandOptions) => {
    const result = await runRenameCommand(fragment, name, opts);
    process.exitCode = result.exitCode;
  });

  withStoreOptions(
    program.command("rename-magazines").description("Give magazine issue records a canonical issue name"),
  ).action(async (opts: StoreCommandOptions) => {
    const result = await runRenameMagazinesCommand(opts);
    process.exitCode = result.exitCode;
  });

  withStoreOptions(
    program.command("clean-titles").description("Strip label prefixes and separator noise from record names"),
  ).action(async (opts: StoreCommandOptions) => {
    const result = await runCleanTitlesCommand(opts);
    process.exitCode = result.exitCode;
  });

  withStoreOptions(
    program
      .command("delete")
      .description("Delete records whose display name contains any keyword")
      .argument("<keywords...>", "Case-insensitive keywords"),
  ).action(async (keywords: string[], opts: StoreCommandOptions) => {
    const result = await runDeleteCommand(keywords, opts);
    process.exitCode = result.exitCode;
  });

  withStoreOptions(
    program.command("prune").description("Delete garbage, reference and unlinked records from the index"),
  ).action(async (opts: StoreCommandOptions) => {
    const result = await runPruneCommand(opts);
    process.exitCode = result.exitCode;
  });

  return program;
}

const isDirectRun = process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isDirectRun) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      stderrLine(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    });
}
