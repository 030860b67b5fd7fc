import { errorMessage } from "../errors.js";
import { loadFileLinks, type FileLinkSet } from "../reconcile/file-links.js";
import { linkFilesPass } from "../reconcile/passes.js";
import { FILE_LINK_DIRS } from "../reconcile/rulesets.js";
import type { PassSummary } from "../types.js";
import { formatError } from "../ui.js";
import { exitCodeFor, resolveStoreDeps, runStoreCommand, type CommandResult, type StoreCommandDeps, type StoreCommandOptions } from "./shared.js";

export interface LinkFilesCommandOptions extends StoreCommandOptions {
  dir?: string[];
}

export interface LinkFilesCommandDeps extends StoreCommandDeps {
  loadFileLinksFn: (dirs: readonly string[]) => Promise<FileLinkSet>;
}

export async function runLinkFilesCommand(
  options: LinkFilesCommandOptions,
  deps?: Partial<LinkFilesCommandDeps>,
): Promise<CommandResult<PassSummary>> {
  const storeDeps = resolveStoreDeps(deps);
  const loadFileLinksFn = deps?.loadFileLinksFn ?? ((dirs: readonly string[]) => loadFileLinks(dirs));
  const requested = (options.dir ?? []).map((value) => value.trim()).filter(Boolean);
  const dirs = requested.length > 0 ? requested : FILE_LINK_DIRS;

  return runStoreCommand(options, storeDeps, async ({ driver, output, logger }) => {
    let found: FileLinkSet;
    try {
      found = await loadFileLinksFn(dirs);
    } catch (error) {
      output.warn(formatError(`Could not list document folders: ${errorMessage(error)}`));
      logger.error("file_links_unreadable", { dirs, error: errorMessage(error) });
      return { exitCode: 1 };
    }
    for (const dir of found.missingDirs) {
      output.warn(`Folder not found: ${dir}`);
      logger.warn("file_dir_missing", { dir });
    }
    output.info(`Found ${found.files.length} document file(s)`);

    if (found.files.length === 0) {
      output.warn("No .pdf or .txt files found; nothing to link.");
      return { exitCode: 1 };
    }

    const summary = await driver.runUpdatePass(linkFilesPass(found.files, { dryRun: options.dryRun }));
    return { exitCode: exitCodeFor(summary), summary };
  });
}
