#!/usr/bin/env -S npx tsx
import { run } from "@optique/run"
import { runCommand } from "./cli/commands.js"
import { parser } from "./cli/parser.js"
import { configureLogging } from "./logging.js"

const command = run(parser, {
  programName: "dtnclient",
  help: "both",
})

await configureLogging({ verbose: command.verbose })

process.exitCode = await runCommand(command, {
  io: {
    out: line => process.stdout.write(`${line}\n`),
    err: line => process.stderr.write(`${line}\n`),
  },
})
