// Runs before each test file
import { configure, type LogRecord } from "@logtape/logtape"

export const logRecords: LogRecord[] = []

await configure({
  reset: true,
  sinks: {
    memory: record => {
      logRecords.push(record)
    },
  },
  loggers: [
    {
      category: ["dtnclient"],
      lowestLevel: "debug",
      sinks: ["memory"],
    },
    {
      category: ["logtape", "meta"],
      lowestLevel: "warning",
      sinks: [],
    },
  ],
})
