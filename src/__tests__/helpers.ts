import { Duplex } from "stream"
import { vi } from "vitest"
import { PacketWriter } from "../packet"
import { encodeVarInt } from "../varint"

/** In-process socket: records what is written, replays what the test pushes */
export class FakeSocket extends Duplex {
    written: Buffer[] = []

    _read() {}

    _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
        this.written.push(chunk)
        callback()
    }

    get output() {
        return Buffer.concat(this.written).toString("hex")
    }

    respond(...packets: PacketWriter[]) {
        for (const packet of packets) this.push(frame(packet))
        return this
    }
}

export function frame(packet: PacketWriter) {
    const payload = packet.encode()
    return Buffer.concat([encodeVarInt(payload.length), payload])
}

export function dialer(...sockets: FakeSocket[]) {
    return vi.fn(async () => {
        const socket = sockets.shift()
        if (!socket) throw new Error("No socket left to dial")
        return socket
    })
}
