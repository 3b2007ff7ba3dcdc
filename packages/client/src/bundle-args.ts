import type { EID } from "@dtnclient/eid"
import type { BundleArgs } from "@dtnclient/wire-format"

export type BundleArgsFields = {
  source: EID
  destination: EID
  payload: Uint8Array
  /** Duration string understood by dtnd, e.g. "24h" or "90m" */
  lifetime?: string
  /** Omitted from the arguments when none */
  reportTo?: EID
}

export const DEFAULT_BUNDLE_LIFETIME = "24h"

/**
 * Shape arguments for dtnd's bundle builder.
 */
export function buildBundleArgs(fields: BundleArgsFields): BundleArgs {
  const args: Record<string, string | boolean | Uint8Array> = {
    source: fields.source.toString(),
    destination: fields.destination.toString(),
    creation_timestamp_now: true,
    lifetime: fields.lifetime ?? DEFAULT_BUNDLE_LIFETIME,
    payload_block: fields.payload,
  }
  if (fields.reportTo?.isSome()) {
    args.report_to = fields.reportTo.toString()
  }
  return args
}
