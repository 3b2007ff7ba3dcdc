import { describe, expect, it } from "vitest"
import {
  BROADCAST_ADDRESS,
  CLIENT_MULTICAST_ADDRESS,
  EID,
  EIDError,
} from "./index.js"

describe("EID", () => {
  describe("parse()", () => {
    it("should accept the dtn:none literal unchanged", () => {
      const eid = EID.parse("dtn:none")
      expect(eid.toString()).toBe("dtn:none")
      expect(eid.isNone()).toBe(true)
      expect(eid.isSome()).toBe(false)
    })

    it("should reject dtn://none", () => {
      expect(() => EID.parse("dtn://none")).toThrow(
        "invalid DTN host: use 'dtn:none', not 'dtn://none'",
      )
    })

    it("should reject none as a node even with a service", () => {
      expect(() => EID.parse("dtn://none/inbox")).toThrow(EIDError)
    })

    it("should reject a dtn EID without a node", () => {
      expect(() => EID.parse("dtn://")).toThrow("invalid DTN EID: missing node")
    })

    it("should add the trailing slash when the service is missing", () => {
      expect(EID.parse("dtn://node1").toString()).toBe("dtn://node1/")
      expect(EID.parse("dtn://node1/").toString()).toBe("dtn://node1/")
    })

    it("should keep the service verbatim, including further slashes", () => {
      expect(EID.parse("dtn://node1/a/b~c").toString()).toBe("dtn://node1/a/b~c")
    })

    it("should accept an empty node before the service", () => {
      const eid = EID.parse("dtn:///svc")
      expect(eid.toString()).toBe("dtn:///svc")
      expect(eid.node()).toBe("")
      expect(eid.service()).toBe("svc")
    })

    it("should accept every sub-delim and unreserved character in a node", () => {
      const node = "a-Z.0_~!$&'()*+,;="
      expect(EID.parse(`dtn://${node}/x`).node()).toBe(node)
    })

    it("should reject nodes with characters outside the allowed class", () => {
      expect(() => EID.parse("dtn://no de/x")).toThrow("invalid DTN node 'no de'")
      expect(() => EID.parse("dtn://nöde/x")).toThrow(EIDError)
    })

    it("should reject non-ASCII services", () => {
      expect(() => EID.parse("dtn://node1/dienst-ä")).toThrow(
        "invalid DTN service 'dienst-ä'",
      )
    })

    it("should accept ipn:1.0", () => {
      const eid = EID.parse("ipn:1.0")
      expect(eid.toString()).toBe("ipn:1.0")
      expect(eid.node()).toBe("1")
      expect(eid.service()).toBe("0")
      expect(eid.scheme()).toBe("ipn")
    })

    it("should canonicalize ipn numbers", () => {
      expect(EID.parse("ipn:007.0010").toString()).toBe("ipn:7.10")
    })

    it("should reject ipn with scheme slashes", () => {
      expect(() => EID.parse("ipn://1.0")).toThrow(
        "invalid IPN EID: must be 'ipn:N.S', not 'ipn://N.S'",
      )
    })

    it("should reject ipn node 0", () => {
      expect(() => EID.parse("ipn:0.5")).toThrow("IPN node must be >= 1")
    })

    it("should require exactly one dot", () => {
      expect(() => EID.parse("ipn:1")).toThrow(
        "invalid IPN EID: need exactly one dot (node.service)",
      )
      expect(() => EID.parse("ipn:1.2.3")).toThrow(
        "invalid IPN EID: need exactly one dot (node.service)",
      )
    })

    it("should reject malformed ipn numbers", () => {
      expect(() => EID.parse("ipn:a.1")).toThrow("invalid IPN numbers: 'a.1'")
      expect(() => EID.parse("ipn:1.-1")).toThrow(EIDError)
      expect(() => EID.parse("ipn:1.")).toThrow(EIDError)
      expect(() => EID.parse("ipn:1__0.2")).toThrow("invalid IPN numbers: '1__0.2'")
      expect(() => EID.parse("ipn:_1.2")).toThrow("invalid IPN numbers: '_1.2'")
      expect(() => EID.parse("ipn:0x1.2")).toThrow("invalid IPN numbers: '0x1.2'")
    })

    it("should read ipn numbers the way int() does", () => {
      expect(EID.parse("ipn:+1.2").toString()).toBe("ipn:1.2")
      expect(EID.parse("ipn:1.-0").toString()).toBe("ipn:1.0")
      expect(EID.parse("ipn: 1.2 ").toString()).toBe("ipn:1.2")
      expect(EID.parse("ipn:1_0.2").toString()).toBe("ipn:10.2")
      expect(() => EID.parse("ipn:-3.2")).toThrow("IPN node must be >= 1")
    })

    it("should accept numbers up to the unsigned 64-bit limit", () => {
      expect(EID.parse("ipn:18446744073709551615.1").toString()).toBe(
        "ipn:18446744073709551615.1",
      )
      expect(() => EID.parse("ipn:18446744073709551616.1")).toThrow(
        "IPN numbers must fit in an unsigned 64-bit integer",
      )
    })

    it("should reject unknown schemes", () => {
      expect(() => EID.parse("http://node1/x")).toThrow(
        "unknown scheme (expected 'dtn:' or 'ipn:')",
      )
      expect(() => EID.parse("dtn:node1")).toThrow(EIDError)
      expect(() => EID.parse("")).toThrow(EIDError)
    })

    it("should record the offending input on the error", () => {
      try {
        EID.parse("dtn://")
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(EIDError)
        if (error instanceof EIDError) {
          expect(error.name).toBe("EIDError")
          expect(error.input).toBe("dtn://")
        }
      }
    })
  })

  describe("round-trip", () => {
    it("should re-parse its own text to an equal EID", () => {
      const texts = [
        "dtn://node1/svc",
        "dtn://node-2.example/",
        "dtn://n/a/b/c",
        "dtn:none",
        "ipn:12.34",
      ]
      for (const text of texts) {
        const eid = EID.parse(text)
        const reparsed = EID.parse(eid.toString())
        expect(reparsed.equals(eid)).toBe(true)
        expect(reparsed).toEqual(eid)
      }
    })
  })

  describe("factories", () => {
    it("should build dtn endpoints", () => {
      expect(EID.dtn("node1", "svc").toString()).toBe("dtn://node1/svc")
      expect(EID.dtn("node1").toString()).toBe("dtn://node1/")
      expect(EID.dtn("node1", "").toString()).toBe("dtn://node1/")
    })

    it("should validate dtn factory input", () => {
      expect(() => EID.dtn("bad/node", "svc")).toThrow(
        "invalid DTN node 'bad/node'",
      )
      expect(() => EID.dtn("none")).toThrow(EIDError)
      expect(() => EID.dtn("node1", "ü")).toThrow("invalid DTN service 'ü'")
    })

    it("should build ipn endpoints from numbers and bigints", () => {
      expect(EID.ipn(1, 0).toString()).toBe("ipn:1.0")
      expect(EID.ipn(2n ** 64n - 1n, 7).toString()).toBe(
        "ipn:18446744073709551615.7",
      )
    })

    it("should validate ipn factory input", () => {
      expect(() => EID.ipn(0, 1)).toThrow("IPN node must be >= 1")
      expect(() => EID.ipn(1, -1)).toThrow("IPN service must be >= 0")
      expect(() => EID.ipn(1.5, 1)).toThrow("invalid IPN node number: 1.5")
    })

    it("should return the same none endpoint every time", () => {
      expect(EID.none()).toBe(EID.none())
      expect(EID.none().equals(EID.parse("dtn:none"))).toBe(true)
    })
  })

  describe("accessors", () => {
    it("should return null parts for dtn:none", () => {
      expect(EID.none().node()).toBeNull()
      expect(EID.none().service()).toBeNull()
      expect(EID.none().scheme()).toBe("dtn")
    })

    it("should split dtn endpoints at the first slash", () => {
      const eid = EID.parse("dtn://node1/a/b")
      expect(eid.node()).toBe("node1")
      expect(eid.service()).toBe("a/b")
    })

    it("should serialize to its canonical text in JSON", () => {
      expect(JSON.stringify({ to: EID.dtn("node1", "svc") })).toBe(
        '{"to":"dtn://node1/svc"}',
      )
    })

    it("should be immutable", () => {
      expect(Object.isFrozen(EID.dtn("node1", "svc"))).toBe(true)
    })
  })

  describe("well-known addresses", () => {
    it("should use the ~ service on rec.* nodes", () => {
      expect(BROADCAST_ADDRESS.toString()).toBe("dtn://rec.all/~")
      expect(CLIENT_MULTICAST_ADDRESS.node()).toBe("rec.client")
    })
  })
})
