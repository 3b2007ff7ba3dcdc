import { EID } from "./eid.js"

// Group addresses shared by the reactive-computing services built on dtnd
export const BROADCAST_ADDRESS = EID.dtn("rec.all", "~")
export const BROKER_MULTICAST_ADDRESS = EID.dtn("rec.broker", "~")
export const DATASTORE_MULTICAST_ADDRESS = EID.dtn("rec.store", "~")
export const EXECUTOR_MULTICAST_ADDRESS = EID.dtn("rec.executor", "~")
export const CLIENT_MULTICAST_ADDRESS = EID.dtn("rec.client", "~")
