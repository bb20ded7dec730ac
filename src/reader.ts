import { Readable } from "stream"
import { ConnectionError, UnexpectedEofError } from "./errors"

interface PendingRead {
    length: number
    resolve: (buffer: Buffer) => void
    reject: (error: Error) => void
}

/**
 * Collects chunks from a readable stream and hands them out in exact sizes.
 * Only one read may be pending at a time. A read that is aborted through its
 * signal consumes nothing.
 */
export class StreamReader {
    private buffer = Buffer.alloc(0)
    private pending?: PendingRead
    private error?: Error
    private ended = false

    constructor(stream: Readable) {
        stream.on("data", (chunk: Buffer) => {
            this.buffer = Buffer.concat([this.buffer, chunk])
            this.flush()
        })
        stream.on("end", () => this.finish())
        stream.on("close", () => this.finish())
        stream.on("error", error => {
            this.error = new ConnectionError(`Stream error: ${error.message}`, { cause: error })
            this.flush()
        })
    }

    /** Bytes received but not read yet */
    get buffered() {
        return this.buffer.length
    }

    async readByte(signal?: AbortSignal) {
        return (await this.read(1, signal)).readUInt8(0)
    }

    read(length: number, signal?: AbortSignal) {
        return new Promise<Buffer>((resolve, reject) => {
            if (this.pending) return reject(new ConnectionError("Another read is already pending"))
            if (signal?.aborted) return reject(abortReason(signal))

            const onAbort = () => {
                if (this.pending != pending) return
                this.pending = undefined
                reject(abortReason(signal))
            }
            const pending: PendingRead = {
                length,
                resolve: buffer => (signal?.removeEventListener("abort", onAbort), resolve(buffer)),
                reject: error => (signal?.removeEventListener("abort", onAbort), reject(error))
            }

            signal?.addEventListener("abort", onAbort, { once: true })
            this.pending = pending
            this.flush()
        })
    }

    private finish() {
        this.ended = true
        this.flush()
    }

    private flush() {
        const pending = this.pending
        if (!pending) return

        if (this.buffer.length >= pending.length) {
            this.pending = undefined
            const buffer = this.buffer.subarray(0, pending.length)
            this.buffer = this.buffer.subarray(pending.length)
            pending.resolve(buffer)
        } else if (this.error) {
            this.pending = undefined
            pending.reject(this.error)
        } else if (this.ended) {
            this.pending = undefined
            pending.reject(new UnexpectedEofError)
        }
    }
}

function abortReason(signal?: AbortSignal) {
    const reason: unknown = signal?.reason
    return reason instanceof Error ? reason : new ConnectionError("Read was aborted")
}
