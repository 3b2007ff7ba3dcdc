/**
 * Wire format constants for the dtnd application-agent protocol.
 */

/** Message type discriminators (the `Type` field on the wire) */
export const MessageType = {
  Response: 1,
  RegisterEID: 2,
  UnregisterEID: 3,
  BundleCreate: 4,
  BundleCreateResponse: 5,
  ListBundles: 6,
  ListResponse: 7,
  FetchBundle: 8,
  FetchBundleResponse: 9,
  FetchAllBundles: 10,
  FetchAllBundlesResponse: 11,
} as const

export type MessageTypeName = keyof typeof MessageType

export type MessageTypeId = (typeof MessageType)[MessageTypeName]

const MESSAGE_TYPE_NAMES = new Map<number, MessageTypeName>(
  Object.entries(MessageType).flatMap(([name, id]) =>
    isMessageTypeName(name) ? [[id, name] as const] : [],
  ),
)

function isMessageTypeName(name: string): name is MessageTypeName {
  return name in MessageType
}

/**
 * Resolve a raw discriminant against the message type table.
 * Returns undefined for values outside the table.
 */
export function toMessageTypeId(value: number): MessageTypeId | undefined {
  return Object.values(MessageType).find(id => id === value)
}

/**
 * Human-readable form of a discriminant, e.g. `7 (ListResponse)`.
 */
export function formatMessageType(value: number): string {
  const name = MESSAGE_TYPE_NAMES.get(value)
  return name ? `${value} (${name})` : String(value)
}
