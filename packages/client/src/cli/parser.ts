import { merge, object, or } from "@optique/core/constructs"
import { message } from "@optique/core/message"
import { optional, withDefault } from "@optique/core/modifiers"
import type { InferValue } from "@optique/core/parser"
import { argument, command, constant, option } from "@optique/core/primitives"
import { integer, string } from "@optique/core/valueparser"
import { DEFAULT_BUNDLE_LIFETIME } from "../bundle-args.js"

const connectionOptions = object({
  socket: optional(
    option("-s", "--socket", string({ metavar: "PATH" }), {
      description: message`Path to the dtn application-agent's socket`,
    }),
  ),
  verbose: option("-v", "--verbose", {
    description: message`Verbose logging`,
  }),
  timeout: optional(
    option("--timeout", integer({ min: 1, metavar: "MS" }), {
      description: message`Give up on dtnd after this many milliseconds`,
    }),
  ),
})

const registerCommand = object({
  cmd: constant("register" as const),
  endpoint: argument(string({ metavar: "EID" }), {
    description: message`EndpointID to (un)register`,
  }),
  unregister: option("-u", "--unregister", {
    description: message`Perform unregistration rather than registration`,
  }),
})

const payloadSource = or(
  object({
    payloadFile: option("--payload-file", string({ metavar: "PATH" }), {
      description: message`Read the payload from a file`,
    }),
  }),
  object({
    payload: option("--payload", string({ metavar: "TEXT" }), {
      description: message`Use the given text as payload`,
    }),
  }),
)

const createCommand = merge(
  object({
    cmd: constant("create" as const),
    source: option("--source", string({ metavar: "EID" }), {
      description: message`Source EndpointID`,
    }),
    destination: option("--destination", string({ metavar: "EID" }), {
      description: message`Destination EndpointID`,
    }),
    lifetime: withDefault(
      option("--lifetime", string({ metavar: "DURATION" }), {
        description: message`Bundle lifetime, e.g. 24h`,
      }),
      DEFAULT_BUNDLE_LIFETIME,
    ),
    reportTo: optional(
      option("--report-to", string({ metavar: "EID" }), {
        description: message`EndpointID that receives status reports`,
      }),
    ),
  }),
  payloadSource,
)

const listCommand = object({
  cmd: constant("list" as const),
  mailbox: argument(string({ metavar: "MAILBOX" })),
  newOnly: option("--new", {
    description: message`Only bundles that were never fetched`,
  }),
})

const fetchCommand = object({
  cmd: constant("fetch" as const),
  mailbox: argument(string({ metavar: "MAILBOX" })),
  bundleID: argument(string({ metavar: "BUNDLE_ID" })),
  remove: option("--remove", {
    description: message`Delete the bundle from the mailbox after fetching`,
  }),
  output: optional(
    option("--output", string({ metavar: "PATH" }), {
      description: message`Write the payload to this file`,
    }),
  ),
})

const fetchAllCommand = object({
  cmd: constant("fetch-all" as const),
  mailbox: argument(string({ metavar: "MAILBOX" })),
  newOnly: option("--new", {
    description: message`Only bundles that were never fetched`,
  }),
  remove: option("--remove", {
    description: message`Delete the bundles from the mailbox after fetching`,
  }),
  outputDir: optional(
    option("--output-dir", string({ metavar: "DIR" }), {
      description: message`Write each payload to DIR/<bundle id>`,
    }),
  ),
})

export const parser = or(
  command("register", merge(connectionOptions, registerCommand), {
    description: message`Perform (un)registrations of EndpointIDs`,
  }),
  command("create", merge(connectionOptions, createCommand), {
    description: message`Create and send a bundle`,
  }),
  command("list", merge(connectionOptions, listCommand), {
    description: message`List the bundles stored in a mailbox`,
  }),
  command("fetch", merge(connectionOptions, fetchCommand), {
    description: message`Fetch one bundle from a mailbox`,
  }),
  command("fetch-all", merge(connectionOptions, fetchAllCommand), {
    description: message`Fetch every bundle from a mailbox`,
  }),
)

export type CliCommand = InferValue<typeof parser>
