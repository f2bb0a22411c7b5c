import { ensureSiteLayout, loadConfig } from "../../core/config-loader";
import { Finalizer, type FinalizerDeps } from "../../core/drafts/finalizer";
import { log } from "../log";
import { reportFailure, type GlobalOptions } from "./shared";

export async function runFinalizeCommand(
  options: GlobalOptions = {},
  deps: FinalizerDeps & { cwd?: string } = {}
): Promise<void> {
  try {
    const config = await loadConfig({ cwd: deps.cwd, configPath: options.config });
    await ensureSiteLayout(config);

    const report = await new Finalizer(config, deps).finalizeAll();

    if (report.finalized.length === 0 && report.failed.length === 0) {
      log.info("No drafts to finalize.");
      return;
    }

    log.success(`Finalized ${report.finalized.length} draft(s).`);
    if (report.failed.length > 0) {
      log.error(
        `${report.failed.length} draft(s) left in ${config.paths.drafts}: ${report.failed
          .map((failure) => failure.slug)
          .join(", ")}`
      );
      process.exitCode = 1;
    }
  } catch (error) {
    reportFailure(error);
  }
}
