import path from "node:path";
import { errorMessage } from "../errors.js";
import { loadLabelLinks, type LabelLinkSet } from "../reconcile/ground-truth.js";
import { linkLabelsPass } from "../reconcile/passes.js";
import type { PassSummary } from "../types.js";
import { formatError } from "../ui.js";
import { exitCodeFor, resolveStoreDeps, runStoreCommand, type CommandResult, type StoreCommandDeps, type StoreCommandOptions } from "./shared.js";

export interface LinkLabelsCommandOptions extends StoreCommandOptions {
  dir?: string;
}

export interface LinkLabelsCommandDeps extends StoreCommandDeps {
  loadLabelLinksFn: typeof loadLabelLinks;
}

export async function runLinkLabelsCommand(
  options: LinkLabelsCommandOptions,
  deps?: Partial<LinkLabelsCommandDeps>,
): Promise<CommandResult<PassSummary>> {
  const storeDeps = resolveStoreDeps(deps);
  const loadLabelLinksFn = deps?.loadLabelLinksFn ?? loadLabelLinks;

  return runStoreCommand(options, storeDeps, async ({ config, driver, output, logger }) => {
    const dir = path.resolve(options.dir?.trim() || config.labelsDir);
    let labels: LabelLinkSet;
    try {
      labels = await loadLabelLinksFn(dir);
    } catch (error) {
      output.warn(formatError(`Could not read label files from ${dir}: ${errorMessage(error)}`));
      logger.error("ground_truth_unreadable", { dir, error: errorMessage(error) });
      return { exitCode: 1 };
    }
    for (const skipped of labels.skipped) {
      output.warn(`Skipped ${skipped.file}: ${skipped.reason}`);
      logger.warn("ground_truth_skipped", { file: skipped.file, reason: skipped.reason });
    }
    output.info(`Loaded ${labels.links.length} label link(s) from ${dir}`);

    if (labels.links.length === 0) {
      output.warn("No usable label files; nothing to link.");
      return { exitCode: 1 };
    }

    const summary = await driver.runUpdatePass(linkLabelsPass(labels.links, { dryRun: options.dryRun }));
    return { exitCode: exitCodeFor(summary), summary };
  });
}
