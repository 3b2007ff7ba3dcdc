/**
 * @dtnclient/client
 *
 * Client for dtnd's application-agent socket: length-prefixed framing, the
 * request/reply call, and the high-level mailbox operations built on it.
 *
 * @example
 * ```typescript
 * import { EID } from "@dtnclient/eid"
 * import { buildBundleArgs, DtndClient } from "@dtnclient/client"
 *
 * const client = new DtndClient({ socketPath: "/tmp/dtnd.socket" })
 * const bundleID = await client.createBundle(
 *   buildBundleArgs({
 *     source: EID.parse("dtn://node1/out"),
 *     destination: EID.parse("dtn://node2/inbox"),
 *     payload: new TextEncoder().encode("hello"),
 *   }),
 * )
 * ```
 */

export {
  type BundleArgsFields,
  buildBundleArgs,
  DEFAULT_BUNDLE_LIFETIME,
} from "./bundle-args.js"
export { DtndClient, type DtndClientOptions } from "./client.js"
export {
  type ClientConfig,
  type ClientConfigOverrides,
  loadClientConfig,
} from "./config.js"
export {
  type Connection,
  type ConnectionFactory,
  StreamConnection,
  type StreamConnectionOptions,
  streamConnection,
  unixSocketConnector,
} from "./connection.js"
export {
  ConfigError,
  ConnectionNotFoundError,
  DataError,
  DTNDError,
  TransportError,
  type TransportErrorCode,
} from "./errors.js"
export {
  decodeLengthPrefix,
  encodeLengthPrefix,
  frame,
  LENGTH_PREFIX_SIZE,
} from "./framing.js"
export { configureLogging } from "./logging.js"
export {
  expectResponse,
  type SendMessageOptions,
  sendMessage,
} from "./send-message.js"
