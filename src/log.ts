/**
 * Logger categories. Library code only asks for loggers; sinks are installed
 * by the application (or the CLI through configureLogging()).
 */
import {
  configure,
  getConsoleSink,
  getLogger,
  type LogLevel,
  type Logger,
} from "@logtape/logtape";

export const ROOT_CATEGORY = "dam-changes";

export type Component =
  | "dispatcher"
  | "upload"
  | "tracker"
  | "retrier"
  | "connection"
  | "renditions"
  | "journal"
  | "cli";

export function componentLogger(component: Component): Logger {
  return getLogger([ROOT_CATEGORY, component]);
}

export async function configureLogging(
  lowestLevel: LogLevel = "info",
): Promise<void> {
  await configure({
    sinks: { console: getConsoleSink() },
    loggers: [
      { category: [ROOT_CATEGORY], lowestLevel, sinks: ["console"] },
      { category: ["logtape", "meta"], lowestLevel: "warning", sinks: ["console"] },
    ],
  });
}
