import { describe, it, expect, vi, beforeEach } from "vitest"
import { promises as dns } from "dns"
import { resolveAddress, formatUuid, DEFAULT_PORT } from "../utils"

vi.mock("dns", () => ({ promises: { resolveSrv: vi.fn() } }))

describe("resolveAddress", () => {
    beforeEach(() => {
        vi.mocked(dns.resolveSrv).mockReset()
    })

    it("keeps an explicit port", async () => {
        expect(await resolveAddress("example.net", 25570)).toEqual({ host: "example.net", port: 25570 })
        expect(dns.resolveSrv).not.toHaveBeenCalled()
    })

    it("uses the default port for addresses that are not domain names", async () => {
        expect(await resolveAddress("localhost")).toEqual({ host: "localhost", port: DEFAULT_PORT })
        expect(await resolveAddress("127.0.0.1")).toEqual({ host: "127.0.0.1", port: DEFAULT_PORT })
        expect(dns.resolveSrv).not.toHaveBeenCalled()
    })

    it("follows the SRV record of a domain", async () => {
        vi.mocked(dns.resolveSrv).mockResolvedValue([{ name: "mc.example.net", port: 25570, priority: 0, weight: 5 }])

        expect(await resolveAddress("example.net")).toEqual({ host: "mc.example.net", port: 25570 })
        expect(dns.resolveSrv).toHaveBeenCalledWith("_minecraft._tcp.example.net")
    })

    it("falls back to the default port when the lookup fails", async () => {
        vi.mocked(dns.resolveSrv).mockRejectedValue(new Error("queryNotFound"))

        expect(await resolveAddress("play-server.example.net", null)).toEqual({
            host: "play-server.example.net", port: DEFAULT_PORT
        })
    })
})

describe("formatUuid", () => {
    it("dashes 16 bytes as 8-4-4-4-12 hex", () => {
        const bytes = Buffer.from("0123456789abcdef0123456789abcdef", "hex")
        expect(formatUuid(bytes)).toBe("01234567-89ab-cdef-0123-456789abcdef")
    })

    it("rejects other lengths", () => {
        expect(() => formatUuid(Buffer.alloc(15))).toThrow(RangeError)
    })
})
