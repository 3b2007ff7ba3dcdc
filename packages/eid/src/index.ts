/**
 * @dtnclient/eid
 *
 * Endpoint identifiers (EIDs) for the bundle protocol: parsing,
 * normalization and validation of the `dtn:` and `ipn:` schemes.
 *
 * @example
 * ```typescript
 * import { EID, EIDError } from "@dtnclient/eid"
 *
 * const mailbox = EID.parse("dtn://node1/inbox")
 * mailbox.node() // "node1"
 * mailbox.service() // "inbox"
 *
 * try {
 *   EID.parse("ipn:0.5")
 * } catch (error) {
 *   if (error instanceof EIDError) {
 *     console.error(error.message) // IPN node must be >= 1
 *   }
 * }
 * ```
 */

export {
  BROADCAST_ADDRESS,
  BROKER_MULTICAST_ADDRESS,
  CLIENT_MULTICAST_ADDRESS,
  DATASTORE_MULTICAST_ADDRESS,
  EXECUTOR_MULTICAST_ADDRESS,
} from "./addresses.js"
export { DTN_NONE, DTN_PREFIX, IPN_PREFIX } from "./constants.js"
export { EID, type EIDScheme, type IpnNumber } from "./eid.js"
export { EIDError } from "./errors.js"
