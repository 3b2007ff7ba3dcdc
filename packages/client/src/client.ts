import type { EID } from "@dtnclient/eid"
import { getLogger, type Logger } from "@logtape/logtape"
import {
  type BundleArgs,
  type BundleContent,
  createBundleCreate,
  createFetchAllBundles,
  createFetchBundle,
  createListBundles,
  createRegisterUnregister,
  type Message,
  MessageType,
} from "@dtnclient/wire-format"
import { type ConnectionFactory, unixSocketConnector } from "./connection.js"
import { expectResponse, sendMessage } from "./send-message.js"

export type DtndClientOptions = (
  | { socketPath: string; connect?: never }
  | { connect: ConnectionFactory; socketPath?: never }
) & {
  /** Deadline for each call; only used with `socketPath` */
  timeoutMs?: number
  logger?: Logger
  /** Where undecodable replies are saved; `false` turns this off */
  dumpDirectory?: string | false
}

/**
 * Client for dtnd's application-agent socket.
 *
 * Every operation opens its own connection, sends one request, and checks
 * that the reply is the variant the operation expects.
 *
 * @example
 * ```typescript
 * const client = new DtndClient({ socketPath: "/tmp/dtnd.socket" })
 * const inbox = EID.parse("dtn://node1/inbox")
 * await client.register(inbox)
 * for (const id of await client.listBundles(inbox, { newOnly: true })) {
 *   const bundle = await client.fetchBundle(inbox, id, { remove: true })
 * }
 * ```
 */
export class DtndClient {
  private readonly connect: ConnectionFactory
  private readonly logger: Logger
  private readonly dumpDirectory: string | false | undefined

  constructor(options: DtndClientOptions) {
    this.connect =
      options.connect !== undefined
        ? options.connect
        : unixSocketConnector(options.socketPath, {
            timeoutMs: options.timeoutMs,
          })
    this.logger = options.logger ?? getLogger(["dtnclient", "client"])
    this.dumpDirectory = options.dumpDirectory
  }

  async registerUnregister(eid: EID, register: boolean): Promise<void> {
    this.logger.debug(
      register ? "registering {eid}" : "unregistering {eid}",
      { eid: eid.toString() },
    )
    await this.send(
      createRegisterUnregister({
        type: register ? MessageType.RegisterEID : MessageType.UnregisterEID,
        endpoint: eid,
      }),
    )
  }

  register(eid: EID): Promise<void> {
    return this.registerUnregister(eid, true)
  }

  unregister(eid: EID): Promise<void> {
    return this.registerUnregister(eid, false)
  }

  /**
   * Ask dtnd to build and dispatch a bundle.
   *
   * @param args - bundle builder arguments, see `buildBundleArgs`
   * @returns the ID dtnd assigned to the new bundle
   */
  async createBundle(args: BundleArgs): Promise<string> {
    const response = await this.send(createBundleCreate({ args }))
    return expectResponse(response, MessageType.BundleCreateResponse).bundleID
  }

  /**
   * List the IDs of bundles stored in a mailbox. With `newOnly`, only
   * bundles that were never fetched.
   */
  async listBundles(
    mailbox: EID,
    options: { newOnly?: boolean } = {},
  ): Promise<string[]> {
    const response = await this.send(
      createListBundles({ mailbox, newOnly: options.newOnly ?? false }),
    )
    return [...expectResponse(response, MessageType.ListResponse).bundleIDs]
  }

  async fetchBundle(
    mailbox: EID,
    bundleID: string,
    options: { remove?: boolean } = {},
  ): Promise<BundleContent> {
    const response = await this.send(
      createFetchBundle({ mailbox, bundleID, remove: options.remove ?? false }),
    )
    return expectResponse(response, MessageType.FetchBundleResponse).content
  }

  async fetchAllBundles(
    mailbox: EID,
    options: { newOnly?: boolean; remove?: boolean } = {},
  ): Promise<BundleContent[]> {
    const response = await this.send(
      createFetchAllBundles({
        mailbox,
        newOnly: options.newOnly ?? false,
        remove: options.remove ?? false,
      }),
    )
    return [...expectResponse(response, MessageType.FetchAllBundlesResponse).contents]
  }

  private send(message: Message) {
    return sendMessage(this.connect, message, {
      logger: this.logger,
      dumpDirectory: this.dumpDirectory,
    })
  }
}
