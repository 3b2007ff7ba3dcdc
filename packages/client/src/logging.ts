import { configure, getConsoleSink } from "@logtape/logtape"

/**
 * Install console logging for the command-line tool. Library code only
 * obtains loggers; sinks are set up here.
 */
export async function configureLogging(options: { verbose: boolean }) {
  await configure({
    reset: true,
    sinks: { console: getConsoleSink() },
    loggers: [
      {
        category: ["dtnclient"],
        lowestLevel: options.verbose ? "debug" : "info",
        sinks: ["console"],
      },
      {
        category: ["logtape", "meta"],
        lowestLevel: "warning",
        sinks: ["console"],
      },
    ],
  })
}
