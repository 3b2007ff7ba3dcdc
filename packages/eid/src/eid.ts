import {
  ASCII_PATTERN,
  DTN_NODE_PATTERN,
  DTN_NONE,
  DTN_PREFIX,
  IPN_MAX_NUMBER,
  IPN_NUMBER_PATTERN,
  IPN_PREFIX,
} from "./constants.js"
import { EIDError } from "./errors.js"

export type EIDScheme = "dtn" | "ipn"

/**
 * An IPN node or service number. Values beyond `Number.MAX_SAFE_INTEGER`
 * must be given as bigint.
 */
export type IpnNumber = number | bigint

/**
 * Endpoint identifier for the bundle protocol.
 *
 * An EID always holds one of three canonical textual forms:
 *
 * - `dtn:none`
 * - `dtn://<node>/<service>`
 * - `ipn:<node>.<service>`
 *
 * Instances are immutable and compare by their canonical text. The none
 * endpoint stands in for "no endpoint" (e.g. no report-to address); use
 * `isNone()` / `isSome()` to test for it.
 *
 * @example
 * ```typescript
 * EID.parse("dtn://node1") // dtn://node1/
 * EID.dtn("node1", "inbox") // dtn://node1/inbox
 * EID.ipn(5, 0) // ipn:5.0
 * EID.parse("dtn://none") // throws EIDError
 * ```
 */
export class EID {
  private readonly value: string

  private constructor(value: string) {
    this.value = value
    Object.freeze(this)
  }

  /**
   * Parse and normalize arbitrary text into an EID.
   *
   * @throws EIDError if the text is not a valid `dtn` or `ipn` endpoint
   */
  static parse(text: string): EID {
    return new EID(normalize(text))
  }

  /**
   * Create a `dtn` endpoint. An empty or absent service yields the
   * node's root endpoint (`dtn://node/`). Use `EID.none()` for `dtn:none`.
   */
  static dtn(node: string, service?: string): EID {
    checkDtnNode(node)
    if (service === undefined || service === "") {
      return EID.parse(`${DTN_PREFIX}${node}/`)
    }
    checkDtnService(service)
    return EID.parse(`${DTN_PREFIX}${node}/${service}`)
  }

  /**
   * Create an `ipn` endpoint from node (>= 1) and service (>= 0) numbers.
   */
  static ipn(node: IpnNumber, service: IpnNumber): EID {
    const nodeNumber = toIpnNumber(node, "node")
    const serviceNumber = toIpnNumber(service, "service")
    checkIpnRange(nodeNumber, serviceNumber)
    return new EID(`${IPN_PREFIX}${nodeNumber}.${serviceNumber}`)
  }

  static none(): EID {
    return NONE
  }

  isNone(): boolean {
    return this.value === DTN_NONE
  }

  isSome(): boolean {
    return !this.isNone()
  }

  scheme(): EIDScheme {
    return this.value.startsWith(IPN_PREFIX) ? "ipn" : "dtn"
  }

  /**
   * The node part of the endpoint, or `null` for `dtn:none`.
   */
  node(): string | null {
    return this.split()?.[0] ?? null
  }

  /**
   * The service part of the endpoint, or `null` for `dtn:none`.
   * A dtn root endpoint (`dtn://node/`) has the empty service.
   */
  service(): string | null {
    return this.split()?.[1] ?? null
  }

  equals(other: EID): boolean {
    return this.value === other.value
  }

  toString(): string {
    return this.value
  }

  toJSON(): string {
    return this.value
  }

  private split(): [string, string] | undefined {
    if (this.isNone()) {
      return undefined
    }
    if (this.value.startsWith(DTN_PREFIX)) {
      return splitOnce(this.value.slice(DTN_PREFIX.length), "/")
    }
    return splitOnce(this.value.slice(IPN_PREFIX.length), ".")
  }
}

const NONE = EID.parse(DTN_NONE)

function splitOnce(text: string, separator: string): [string, string] {
  const index = text.indexOf(separator)
  if (index === -1) {
    return [text, ""]
  }
  return [text.slice(0, index), text.slice(index + 1)]
}

function checkDtnNode(node: string): void {
  if (!DTN_NODE_PATTERN.test(node)) {
    throw new EIDError(`invalid DTN node '${node}'`, node)
  }
  if (node === "none") {
    throw new EIDError("invalid DTN host: use 'dtn:none', not 'dtn://none'", node)
  }
}

function checkDtnService(service: string): void {
  if (!ASCII_PATTERN.test(service)) {
    throw new EIDError(`invalid DTN service '${service}'`, service)
  }
}

function toIpnNumber(value: IpnNumber, part: "node" | "service"): bigint {
  if (typeof value === "bigint") {
    return value
  }
  if (!Number.isSafeInteger(value)) {
    throw new EIDError(`invalid IPN ${part} number: ${value}`)
  }
  return BigInt(value)
}

function checkIpnRange(node: bigint, service: bigint): void {
  if (node < 1n) {
    throw new EIDError("IPN node must be >= 1")
  }
  if (service < 0n) {
    throw new EIDError("IPN service must be >= 0")
  }
  if (node > IPN_MAX_NUMBER || service > IPN_MAX_NUMBER) {
    throw new EIDError("IPN numbers must fit in an unsigned 64-bit integer")
  }
}

function normalizeDtn(eid: string): string {
  const ssp = eid.slice(DTN_PREFIX.length)
  if (ssp === "none") {
    throw new EIDError("invalid DTN host: use 'dtn:none', not 'dtn://none'", eid)
  }
  if (ssp === "") {
    throw new EIDError("invalid DTN EID: missing node", eid)
  }

  const [node, service] = splitOnce(ssp, "/")
  checkDtnNode(node)
  if (service === "") {
    return `${DTN_PREFIX}${node}/`
  }
  checkDtnService(service)
  return `${DTN_PREFIX}${node}/${service}`
}

function parseIpnNumber(text: string): bigint {
  return BigInt(text.trim().replaceAll("_", ""))
}

function normalizeIpn(eid: string): string {
  const rest = eid.slice(IPN_PREFIX.length)
  if (rest.startsWith("//")) {
    throw new EIDError("invalid IPN EID: must be 'ipn:N.S', not 'ipn://N.S'", eid)
  }

  const parts = rest.split(".")
  if (parts.length !== 2) {
    throw new EIDError(
      "invalid IPN EID: need exactly one dot (node.service)",
      eid,
    )
  }
  const [nodeText, serviceText] = parts
  if (!IPN_NUMBER_PATTERN.test(nodeText) || !IPN_NUMBER_PATTERN.test(serviceText)) {
    throw new EIDError(`invalid IPN numbers: '${rest}'`, eid)
  }

  const node = parseIpnNumber(nodeText)
  const service = parseIpnNumber(serviceText)
  checkIpnRange(node, service)
  return `${IPN_PREFIX}${node}.${service}`
}

function normalize(eid: string): string {
  if (eid === DTN_NONE) {
    return eid
  }
  if (eid.startsWith(DTN_PREFIX)) {
    return normalizeDtn(eid)
  }
  if (eid.startsWith(IPN_PREFIX)) {
    return normalizeIpn(eid)
  }
  throw new EIDError("unknown scheme (expected 'dtn:' or 'ipn:')", eid)
}
