import { ensureSiteLayout, loadConfig } from "../../core/config-loader";
import { DraftStore, type DraftStoreDeps } from "../../core/drafts/draft-store";
import { log } from "../log";
import { reportFailure, type GlobalOptions } from "./shared";

export async function runNewCommand(
  titles: string[],
  options: GlobalOptions = {},
  deps: DraftStoreDeps & { cwd?: string } = {}
): Promise<void> {
  try {
    const config = await loadConfig({ cwd: deps.cwd, configPath: options.config });
    await ensureSiteLayout(config);

    const store = new DraftStore(config, deps);
    const { created } = await store.createDrafts(titles);
    log.success(`Created ${created.length} draft(s) in ${config.paths.drafts}.`);
  } catch (error) {
    reportFailure(error);
  }
}
