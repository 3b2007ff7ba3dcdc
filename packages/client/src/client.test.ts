import { EID } from "@dtnclient/eid"
import {
  createBundleContent,
  createBundleCreateResponse,
  createBundleCreate,
  createFetchAllBundles,
  createFetchAllBundlesResponse,
  createFetchBundle,
  createFetchBundleResponse,
  createListBundles,
  createListResponse,
  createRegisterUnregister,
  createResponse,
  type Message,
  MessageType,
} from "@dtnclient/wire-format"
import { describe, expect, it } from "vitest"
import { DtndClient } from "./client.js"
import { DataError, DTNDError } from "./errors.js"
import { fakeDaemon } from "./testing/fake-daemon.js"

const inbox = EID.dtn("node1", "inbox")

function clientFor(handler: (request: Message) => Message) {
  const daemon = fakeDaemon(handler)
  return { daemon, client: new DtndClient({ connect: daemon.connect }) }
}

describe("DtndClient", () => {
  it("should register and unregister endpoints", async () => {
    const { daemon, client } = clientFor(() => createResponse({}))

    await client.register(inbox)
    await client.unregister(inbox)
    await client.registerUnregister(inbox, true)

    expect(daemon.requests).toEqual([
      createRegisterUnregister({ type: MessageType.RegisterEID, endpoint: inbox }),
      createRegisterUnregister({ type: MessageType.UnregisterEID, endpoint: inbox }),
      createRegisterUnregister({ type: MessageType.RegisterEID, endpoint: inbox }),
    ])
  })

  it("should return the ID of a created bundle", async () => {
    const { daemon, client } = clientFor(() =>
      createBundleCreateResponse({ bundleID: "dtn://node1/-700000000-0" }),
    )
    const args = { source: "dtn://node1/out", destination: "dtn://node2/inbox" }

    expect(await client.createBundle(args)).toBe("dtn://node1/-700000000-0")
    expect(daemon.requests).toEqual([createBundleCreate({ args })])
  })

  it("should list bundle IDs", async () => {
    const { daemon, client } = clientFor(() =>
      createListResponse({ bundleIDs: ["b1", "b2"] }),
    )

    expect(await client.listBundles(inbox, { newOnly: true })).toEqual(["b1", "b2"])
    expect(daemon.requests).toEqual([createListBundles({ mailbox: inbox, newOnly: true })])
  })

  it("should default request flags to false", async () => {
    const { daemon, client } = clientFor(request => {
      switch (request.type) {
        case MessageType.ListBundles:
          return createListResponse({})
        case MessageType.FetchBundle:
          return createFetchBundleResponse({ content: createBundleContent({}) })
        default:
          return createFetchAllBundlesResponse({})
      }
    })

    await client.listBundles(inbox)
    await client.fetchBundle(inbox, "b1")
    await client.fetchAllBundles(inbox)

    expect(daemon.requests).toEqual([
      createListBundles({ mailbox: inbox, newOnly: false }),
      createFetchBundle({ mailbox: inbox, bundleID: "b1", remove: false }),
      createFetchAllBundles({ mailbox: inbox, newOnly: false, remove: false }),
    ])
  })

  it("should fetch one bundle", async () => {
    const content = createBundleContent({
      bundleID: "b1",
      source: EID.dtn("node2", "out"),
      destination: inbox,
      payload: new TextEncoder().encode("hello"),
    })
    const { daemon, client } = clientFor(() => createFetchBundleResponse({ content }))

    expect(await client.fetchBundle(inbox, "b1", { remove: true })).toEqual(content)
    expect(daemon.requests).toEqual([
      createFetchBundle({ mailbox: inbox, bundleID: "b1", remove: true }),
    ])
  })

  it("should fetch every bundle", async () => {
    const contents = [
      createBundleContent({ bundleID: "b1", destination: inbox }),
      createBundleContent({ bundleID: "b2", destination: inbox }),
    ]
    const { daemon, client } = clientFor(() =>
      createFetchAllBundlesResponse({ contents }),
    )

    expect(
      await client.fetchAllBundles(inbox, { newOnly: true, remove: true }),
    ).toEqual(contents)
    expect(daemon.requests).toEqual([
      createFetchAllBundles({ mailbox: inbox, newOnly: true, remove: true }),
    ])
  })

  it("should reject a reply of the wrong variant", async () => {
    const { client } = clientFor(() => createResponse({}))

    await expect(client.listBundles(inbox)).rejects.toThrow(
      new DataError("response should have been 7 (ListResponse), was 1 (Response)"),
    )
  })

  it("should surface daemon errors", async () => {
    const { client } = clientFor(() =>
      createListResponse({ error: "no such mailbox" }),
    )

    await expect(client.listBundles(inbox)).rejects.toBeInstanceOf(DTNDError)
  })
})
