import { describe, it, expect } from "vitest"
import { PassThrough } from "stream"
import { StreamReader } from "../reader"
import { ConnectionError, UnexpectedEofError } from "../errors"

describe("StreamReader", () => {
    it("assembles reads across chunks", async () => {
        const stream = new PassThrough
        const reader = new StreamReader(stream)
        const read = reader.read(4)
        stream.write(Buffer.from([1, 2]))
        stream.write(Buffer.from([3, 4, 5]))

        expect([...await read]).toEqual([1, 2, 3, 4])
        expect(await reader.readByte()).toBe(5)
    })

    it("resolves an empty read at once", async () => {
        const reader = new StreamReader(new PassThrough)
        expect((await reader.read(0)).length).toBe(0)
    })

    it("fails with UnexpectedEofError when the stream ends mid-read", async () => {
        const stream = new PassThrough
        const reader = new StreamReader(stream)
        const read = reader.read(3)
        stream.end(Buffer.from([1]))

        await expect(read).rejects.toBeInstanceOf(UnexpectedEofError)
    })

    it("rejects a second read while one is pending", async () => {
        const stream = new PassThrough
        const reader = new StreamReader(stream)
        const first = reader.read(1)

        await expect(reader.read(1)).rejects.toBeInstanceOf(ConnectionError)
        stream.write(Buffer.from([9]))
        expect([...await first]).toEqual([9])
    })

    it("consumes nothing when a read is aborted", async () => {
        const stream = new PassThrough
        const reader = new StreamReader(stream)
        const controller = new AbortController()
        const read = reader.read(2, controller.signal)
        stream.write(Buffer.from([1]))
        await new Promise(resolve => setImmediate(resolve))

        controller.abort(new Error("stop"))
        await expect(read).rejects.toThrow("stop")
        expect(reader.buffered).toBe(1)

        stream.write(Buffer.from([2]))
        expect([...await reader.read(2)]).toEqual([1, 2])
    })

    it("wraps stream errors in ConnectionError", async () => {
        const stream = new PassThrough
        const reader = new StreamReader(stream)
        const read = reader.read(1)
        stream.destroy(new Error("socket reset"))

        await expect(read).rejects.toBeInstanceOf(ConnectionError)
        await expect(reader.read(1)).rejects.toThrow("Stream error: socket reset")
    })
})
