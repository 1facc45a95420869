/**
 * Final stage of a CLI run: optionally wait for background jobs, then
 * summarise every task.
 */
import { PollingTimeoutError } from "./core/exceptions.js";
import type { ChangeTask, PollingOptions } from "./core/types.js";
import type { ChangeManager } from "./index.js";
import { componentLogger } from "./log.js";

const logger = componentLogger("cli");

export interface RunReport {
  /** One line per task, in registry order. */
  lines: string[];
  exitCode: 0 | 1;
}

export interface ReportOptions {
  wait: boolean;
  polling?: Partial<PollingOptions>;
}

export async function settleAndReport(
  manager: ChangeManager,
  opts: ReportOptions,
): Promise<RunReport> {
  let timedOut = false;
  if (opts.wait && manager.tasks("submitted").length > 0) {
    try {
      await manager.settle(opts.polling);
    } catch (err) {
      if (!(err instanceof PollingTimeoutError)) throw err;
      timedOut = true;
      logger.warn("{count} task(s) still running: {error}", {
        count: manager.tasks("submitted").length,
        error: err.message,
      });
    }
  }

  const failed = manager.tasks("failed").length > 0;
  return {
    lines: manager.tasks().map(formatTask),
    exitCode: failed || timedOut ? 1 : 0,
  };
}

export function formatTask(task: ChangeTask): string {
  const change = task.change;
  const subject =
    change.kind === "metadata"
      ? change.assetRef
      : change.kind === "move"
        ? change.assetRefs.join(", ")
        : change.filename;
  const error = task.error ? ` (${task.error})` : "";
  return `${task.status.padEnd(9)} ${change.kind.padEnd(8)} ${subject}${error}`;
}
