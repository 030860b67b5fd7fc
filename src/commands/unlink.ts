import { createLinkChecker, type LinkCheckFn } from "../reconcile/link-check.js";
import { DEFAULT_UNLINK_POLICY } from "../reconcile/patch.js";
import { brokenLinkPass, unlinkPass } from "../reconcile/passes.js";
import { progressInterval } from "../reconcile/report.js";
import type { PassSummary, UnlinkPolicy } from "../types.js";
import { exitCodeFor, resolveStoreDeps, runStoreCommand, type CommandResult, type StoreCommandDeps, type StoreCommandOptions } from "./shared.js";

export interface UnlinkCommandOptions extends StoreCommandOptions {
  domain?: string[];
  extension?: string[];
}

export function resolveUnlinkPolicy(options: UnlinkCommandOptions): UnlinkPolicy {
  const domains = (options.domain ?? []).map((value) => value.trim()).filter(Boolean);
  const extensions = (options.extension ?? [])
    .map((value) => value.trim())
    .filter(Boolean)
    .map((value) => (value.startsWith(".") ? value : `.${value}`));

  return {
    disallowedDomains: domains.length > 0 ? domains : DEFAULT_UNLINK_POLICY.disallowedDomains,
    disallowedExtensions: extensions.length > 0 ? extensions : DEFAULT_UNLINK_POLICY.disallowedExtensions,
    protectedDomains: DEFAULT_UNLINK_POLICY.protectedDomains,
  };
}

export async function runUnlinkCommand(
  options: UnlinkCommandOptions,
  deps?: Partial<StoreCommandDeps>,
): Promise<CommandResult<PassSummary>> {
  const policy = resolveUnlinkPolicy(options);
  return runStoreCommand(options, resolveStoreDeps(deps), async ({ driver }) => {
    const summary = await driver.runUpdatePass(unlinkPass(policy, { dryRun: options.dryRun }));
    return { exitCode: exitCodeFor(summary), summary };
  });
}

export interface UnlinkBrokenCommandOptions extends StoreCommandOptions {
  timeout?: number;
}

export interface UnlinkBrokenCommandDeps extends StoreCommandDeps {
  checkLinkFn: LinkCheckFn;
}

export async function runUnlinkBrokenCommand(
  options: UnlinkBrokenCommandOptions,
  deps?: Partial<UnlinkBrokenCommandDeps>,
): Promise<CommandResult<PassSummary>> {
  const checkLinkFn = deps?.checkLinkFn ?? createLinkChecker({ timeoutMs: options.timeout });

  return runStoreCommand(options, resolveStoreDeps(deps), async ({ driver, output, logger }) => {
    const pass = brokenLinkPass(checkLinkFn, {
      dryRun: options.dryRun,
      onChecked: (checked, total) => {
        if (checked % progressInterval(total) === 0) {
          output.info(`Checked ${checked}/${total} links...`);
        }
      },
    });
    const summary = await driver.runUpdatePass(pass);

    const broken = [...pass.results].filter(([, reason]) => reason !== null);
    for (const [url, reason] of broken) {
      logger.warn("link_broken", { url, reason });
    }
    output.info(`Checked ${pass.results.size} distinct link(s); ${broken.length} broken.`);
    return { exitCode: exitCodeFor(summary), summary };
  });
}
