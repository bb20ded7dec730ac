import { EncodingError, FramingError } from "./errors"

const SEGMENT_BITS = 0b01111111
const CONTINUE_BIT = 0b10000000

/** A 32-bit VarInt never takes more than 5 bytes */
export const MAX_VARINT_BYTES = 5

export function decodeVarInt(buf: Uint8Array, off = 0): [number, number] {
    let numRead = 0, result = 0, byte: number
    do {
        if (numRead == MAX_VARINT_BYTES) throw new FramingError("VarInt is too big")
        if (off >= buf.length) throw new FramingError("Buffer is too short to read a valid VarInt")
        byte = buf[off++]
        result |= (byte & SEGMENT_BITS) << (7 * numRead++)
    } while ((byte & CONTINUE_BIT) != 0)
    return [result, off]
}

export function writeVarInt(value: number, writeByte: (byte: number) => void) {
    if (!Number.isInteger(value) || value < -0x80000000 || value > 0x7fffffff) {
        throw new EncodingError(`VarInt exceeds maximum allowed size: ${value}`)
    }
    do {
        let temp = value & SEGMENT_BITS
        value >>>= 7
        if (value != 0) temp |= CONTINUE_BIT
        writeByte(temp)
    } while (value != 0)
}

export function encodeVarInt(value: number): Buffer {
    const bytes: number[] = []
    writeVarInt(value, byte => bytes.push(byte))
    return Buffer.from(bytes)
}
