import { writeVarInt, decodeVarInt } from "./varint"
import { EncodingError, FramingError } from "./errors"

export type Packet = PacketReader | PacketWriter | Buffer

/** Protocol version sent in the handshake (1.19) */
export const PROTOCOL_VERSION = 759

export const ids = {
    handshake: 0x0,
    statusRequest: 0x0,
    statusResponse: 0x0,
    pingRequest: 0x1,
    pingResponse: 0x1,
    loginStart: 0x0,
    loginDisconnect: 0x0,
    encryptionRequest: 0x1,
    loginSuccess: 0x2,
    setCompression: 0x3,
    chatMessageS: 0x4,
    keepAliveS: 0x11,
    keepAliveC: 0x1e
} as const

const utf8 = new TextDecoder("utf-8", { fatal: true })

export class PacketReader {
    offset = 0
    private protocolId?: number

    constructor(public buffer: Buffer) {}

    /** Protocol id of the frame, undefined until `readProtocolId` has run */
    get id() {
        return this.protocolId
    }

    get remaining() {
        return this.buffer.length - this.offset
    }

    clone() {
        const packet = new PacketReader(this.buffer)
        packet.protocolId = this.protocolId
        packet.offset = this.offset
        return packet
    }

    readProtocolId() {
        if (this.protocolId != null) throw new FramingError("Protocol id has already been read")
        return this.protocolId = this.readUInt8()
    }

    /** Returns a copy, later reads never alias it */
    read(length: number) {
        this.ensure(length)
        return Buffer.from(this.buffer.subarray(this.offset, this.offset += length))
    }

    readString() {
        const bytes = this.read(this.readVarInt())
        try {
            return utf8.decode(bytes)
        } catch (error) {
            throw new EncodingError("String is not valid UTF-8", { cause: error })
        }
    }

    readJSON<T = unknown>(): T {
        const text = this.readString()
        try {
            return JSON.parse(text)
        } catch (error) {
            throw new EncodingError("String is not valid JSON", { cause: error })
        }
    }

    readBool() {
        return Boolean(this.readUInt8())
    }

    readUInt8() {
        this.ensure(1)
        return this.buffer.readUInt8((this.offset += 1) - 1)
    }

    readUInt16() {
        this.ensure(2)
        return this.buffer.readUInt16BE((this.offset += 2) - 2)
    }

    readUInt32() {
        this.ensure(4)
        return this.buffer.readUInt32BE((this.offset += 4) - 4)
    }

    readUInt64() {
        const first = BigInt(this.readUInt32())
        const last = BigInt(this.readUInt32())
        return (first << 32n) + last
    }

    readVarInt() {
        const [result, offset] = decodeVarInt(this.buffer, this.offset)
        return (this.offset = offset, result)
    }

    private ensure(length: number) {
        if (length < 0 || this.offset + length > this.buffer.length) {
            throw new FramingError(`Could not read ${length} bytes past buffer, ${this.remaining} remaining`)
        }
    }
}

export class PacketWriter {
    buffer = Buffer.alloc(8)
    offset = 0

    constructor(public id?: number) {
        if (id != null) this.writeVarInt(id)
    }

    private extend(len: number) {
        while (this.offset + len > this.buffer.length) {
            this.buffer = Buffer.concat([this.buffer, Buffer.alloc(this.buffer.length)])
        }
    }

    write(buffer: Uint8Array) {
        this.extend(buffer.length)
        this.buffer.set(buffer, this.offset)
        this.offset += buffer.length
        return this
    }

    writeString(string: string) {
        const buffer = Buffer.from(string, "utf-8")
        this.writeVarInt(buffer.length).write(buffer)
        return this
    }

    writeJSON(json: unknown) {
        return this.writeString(JSON.stringify(json))
    }

    writeBool(bool: boolean) {
        return this.writeUInt8(bool ? 1 : 0)
    }

    writeUInt8(x: number) {
        checkRange(x, 0xff)
        this.extend(1)
        this.offset = this.buffer.writeUInt8(x, this.offset)
        return this
    }

    writeUInt16(x: number) {
        checkRange(x, 0xffff)
        this.extend(2)
        this.offset = this.buffer.writeUInt16BE(x, this.offset)
        return this
    }

    writeUInt32(x: number) {
        checkRange(x, 0xffffffff)
        this.extend(4)
        this.offset = this.buffer.writeUInt32BE(x, this.offset)
        return this
    }

    writeUInt64(x: bigint) {
        if (x < 0n || x > 0xffffffffffffffffn) throw new EncodingError(`Value out of range: ${x}`)
        this.writeUInt32(Number(x >> 32n))
        return this.writeUInt32(Number(x & 0xffffffffn))
    }

    writeVarInt(x: number) {
        writeVarInt(x, v => this.writeUInt8(v))
        return this
    }

    encode() {
        return this.buffer.subarray(0, this.offset)
    }
}

function checkRange(x: number, max: number) {
    if (!Number.isInteger(x) || x < 0 || x > max) throw new EncodingError(`Value out of range: ${x}`)
}
