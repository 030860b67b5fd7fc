import { ConfigError, errorMessage } from "../errors.js";
import { magazineRenamePass, renamePass, titleCleanupPass } from "../reconcile/passes.js";
import { DOCUMENT_TYPES, type DocumentType, type PassSummary, type RenameDirective } from "../types.js";
import { formatError } from "../ui.js";
import { exitCodeFor, resolveStoreDeps, runStoreCommand, type CommandResult, type StoreCommandDeps, type StoreCommandOptions } from "./shared.js";

export interface RenameCommandOptions extends StoreCommandOptions {
  type?: string;
  brand?: string;
}

function isDocumentType(value: string): value is DocumentType {
  return DOCUMENT_TYPES.some((type) => type === value);
}

export function buildRenameDirective(fragment: string, name: string, options: RenameCommandOptions): RenameDirective {
  const trimmedFragment = fragment.trim();
  const trimmedName = name.trim();
  if (!trimmedFragment) {
    throw new ConfigError("rename needs a non-empty name fragment to search for");
  }
  if (!trimmedName) {
    throw new ConfigError("rename needs a non-empty new name");
  }

  const directive: RenameDirective = { fragment: trimmedFragment, name: trimmedName };
  const type = options.type?.trim();
  if (type) {
    if (!isDocumentType(type)) {
      throw new ConfigError(`Unknown document type "${type}". Expected one of: ${DOCUMENT_TYPES.join(", ")}`);
    }
    directive.type = type;
  }
  const brand = options.brand?.trim();
  if (brand) {
    directive.brand = brand;
  }
  return directive;
}

export async function runRenameCommand(
  fragment: string,
  name: string,
  options: RenameCommandOptions,
  deps?: Partial<StoreCommandDeps>,
): Promise<CommandResult<PassSummary>> {
  const storeDeps = resolveStoreDeps(deps);

  let directive: RenameDirective;
  try {
    directive = buildRenameDirective(fragment, name, options);
  } catch (error) {
    storeDeps.output.warn(formatError(errorMessage(error)));
    return { exitCode: 1 };
  }

  return runStoreCommand(options, storeDeps, async ({ driver, output }) => {
    const summary = await driver.runUpdatePass(renamePass(directive, { dryRun: options.dryRun }));
    if (summary.matched === 0) {
      output.warn(`No records with a name containing "${directive.fragment}".`);
    }
    return { exitCode: exitCodeFor(summary), summary };
  });
}

export async function runRenameMagazinesCommand(
  options: StoreCommandOptions,
  deps?: Partial<StoreCommandDeps>,
): Promise<CommandResult<PassSummary>> {
  return runStoreCommand(options, resolveStoreDeps(deps), async ({ driver, output }) => {
    const summary = await driver.runUpdatePass(magazineRenamePass({ dryRun: options.dryRun }));
    if (summary.matched === 0) {
      output.warn("No magazine issues found.");
    }
    return { exitCode: exitCodeFor(summary), summary };
  });
}

export async function runCleanTitlesCommand(
  options: StoreCommandOptions,
  deps?: Partial<StoreCommandDeps>,
): Promise<CommandResult<PassSummary>> {
  return runStoreCommand(options, resolveStoreDeps(deps), async ({ driver, output }) => {
    const summary = await driver.runUpdatePass(titleCleanupPass({ dryRun: options.dryRun }));
    if (summary.matched === 0) {
      output.warn("No messy titles found.");
    }
    return { exitCode: exitCodeFor(summary), summary };
  });
}
