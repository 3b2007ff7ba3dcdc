import { mkdir, readFile, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { EID, EIDError } from "@dtnclient/eid"
import { getLogger } from "@logtape/logtape"
import type { BundleContent } from "@dtnclient/wire-format"
import { buildBundleArgs } from "../bundle-args.js"
import { DtndClient } from "../client.js"
import { loadClientConfig } from "../config.js"
import { ConnectionNotFoundError, DataError, DTNDError } from "../errors.js"
import type { CliCommand } from "./parser.js"

const logger = getLogger(["dtnclient", "cli"])

export type CliIO = {
  out: (line: string) => void
  err: (line: string) => void
}

export type CliDependencies = {
  io: CliIO
  env?: NodeJS.ProcessEnv
  /** Builds the client once configuration is resolved */
  createClient?: (options: { socketPath: string; timeoutMs?: number }) => DtndClient
}

/**
 * Render an error the way the command-line tool reports it.
 */
export function describeError(error: unknown): string {
  if (error instanceof ConnectionNotFoundError) {
    return "Could not connect to agent socket"
  }
  if (error instanceof DataError) {
    return `Error communicating with dtnd: ${error.message}`
  }
  if (error instanceof DTNDError) {
    return `dtnd responded with error: ${error.message}`
  }
  if (error instanceof EIDError) {
    return `Invalid endpoint ID: ${error.message}`
  }
  return `Generic error: ${error instanceof Error ? error.message : String(error)}`
}

function summarize(content: BundleContent): string {
  return `${content.bundleID}: ${content.source} -> ${content.destination} (${content.payload.length} bytes)`
}

/**
 * File names for bundle payloads, one per ID and in the same order. IDs are
 * percent-encoded; names that would resolve to a directory or repeat an
 * earlier name are replaced or suffixed.
 */
export function payloadFileNames(bundleIDs: readonly string[]): string[] {
  const used = new Set<string>()
  return bundleIDs.map(bundleID => {
    const encoded = encodeURIComponent(bundleID)
    const base =
      encoded === ""
        ? "unnamed-bundle"
        : encoded === "." || encoded === ".."
          ? "%2E".repeat(encoded.length)
          : encoded
    let name = base
    for (let n = 1; used.has(name); n++) {
      name = `${base}~${n}`
    }
    used.add(name)
    return name
  })
}

async function execute(
  command: CliCommand,
  client: DtndClient,
  io: CliIO,
): Promise<void> {
  switch (command.cmd) {
    case "register": {
      const endpoint = EID.parse(command.endpoint)
      await client.registerUnregister(endpoint, !command.unregister)
      logger.info("success")
      return
    }
    case "create": {
      const payload =
        "payloadFile" in command
          ? new Uint8Array(await readFile(command.payloadFile))
          : new TextEncoder().encode(command.payload)
      const bundleID = await client.createBundle(
        buildBundleArgs({
          source: EID.parse(command.source),
          destination: EID.parse(command.destination),
          payload,
          lifetime: command.lifetime,
          reportTo:
            command.reportTo === undefined ? undefined : EID.parse(command.reportTo),
        }),
      )
      io.out(bundleID)
      return
    }
    case "list": {
      const ids = await client.listBundles(EID.parse(command.mailbox), {
        newOnly: command.newOnly,
      })
      for (const id of ids) {
        io.out(id)
      }
      return
    }
    case "fetch": {
      const content = await client.fetchBundle(
        EID.parse(command.mailbox),
        command.bundleID,
        { remove: command.remove },
      )
      if (command.output !== undefined) {
        await writeFile(command.output, content.payload)
      }
      io.out(summarize(content))
      return
    }
    case "fetch-all": {
      const contents = await client.fetchAllBundles(EID.parse(command.mailbox), {
        newOnly: command.newOnly,
        remove: command.remove,
      })
      const { outputDir } = command
      if (outputDir !== undefined) {
        await mkdir(outputDir, { recursive: true })
        const names = payloadFileNames(contents.map(content => content.bundleID))
        for (const [index, content] of contents.entries()) {
          await writeFile(join(outputDir, names[index]), content.payload)
        }
      }
      for (const content of contents) {
        io.out(summarize(content))
      }
      return
    }
  }
}

/**
 * Run a parsed command and report the outcome.
 *
 * @returns the process exit code
 */
export async function runCommand(
  command: CliCommand,
  dependencies: CliDependencies,
): Promise<number> {
  const { io, env = process.env } = dependencies
  const createClient =
    dependencies.createClient ?? (options => new DtndClient(options))

  try {
    const config = loadClientConfig(
      {
        socketPath: command.socket,
        timeoutMs: command.timeout,
        verbose: command.verbose,
      },
      env,
    )
    const client = createClient({
      socketPath: config.socketPath,
      timeoutMs: config.timeoutMs,
    })
    await execute(command, client, io)
    return 0
  } catch (error) {
    logger.debug("command {cmd} failed: {error}", { cmd: command.cmd, error })
    io.err(describeError(error))
    return 1
  }
}
