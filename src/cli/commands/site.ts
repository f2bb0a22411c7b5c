import { loadConfig } from "../../core/config-loader";
import { Site, type SiteActions, type SiteDeps } from "../../core/site/site-commands";
import { reportFailure, type GlobalOptions } from "./shared";

export type StartOptions = GlobalOptions & {
  refresh?: boolean;
  preview?: boolean;
};

type SiteCommandDeps = SiteDeps & { cwd?: string };

async function runSiteActions(
  actions: SiteActions,
  options: GlobalOptions,
  deps: SiteCommandDeps
): Promise<void> {
  try {
    const config = await loadConfig({ cwd: deps.cwd, configPath: options.config });
    await new Site(config, deps).run(actions);
  } catch (error) {
    reportFailure(error);
  }
}

export function runRefreshCommand(options: GlobalOptions = {}, deps: SiteCommandDeps = {}): Promise<void> {
  return runSiteActions({ refresh: true }, options, deps);
}

export function runStartCommand(options: StartOptions = {}, deps: SiteCommandDeps = {}): Promise<void> {
  return runSiteActions(
    { refresh: options.refresh, preview: options.preview, start: true },
    options,
    deps
  );
}

export function runPreviewCommand(options: GlobalOptions = {}, deps: SiteCommandDeps = {}): Promise<void> {
  return runSiteActions({ preview: true }, options, deps);
}

export async function runDeployCommand(
  options: GlobalOptions = {},
  deps: SiteCommandDeps = {}
): Promise<void> {
  try {
    const config = await loadConfig({ cwd: deps.cwd, configPath: options.config });
    await new Site(config, deps).deploy();
  } catch (error) {
    reportFailure(error);
  }
}
