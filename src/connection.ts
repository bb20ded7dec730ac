import { Socket } from "net"
import { Duplex } from "stream"
import { PacketWriter, PacketReader, Packet, PROTOCOL_VERSION, ids } from "./packet"
import { encodeVarInt, decodeVarInt, MAX_VARINT_BYTES } from "./varint"
import { StreamReader } from "./reader"
import { Emitter } from "./events"
import { resolveAddress, formatUuid } from "./utils"
import {
    ConnectionError, DisconnectError, EncodingError, FramingError, ProtocolError, TimeoutError
} from "./errors"

export enum State {
    Handshake = 0,
    Status = 1,
    Login = 2,
    Play = 3
}

/** Lifecycle of the underlying stream with respect to the handshake */
export enum Phase {
    Fresh = "fresh",
    HandshakeSent = "handshakeSent",
    Closed = "closed"
}

export type Dialer = (host: string, port: number, options: Required<ClientOptions>) => Promise<Duplex>

export interface ClientOptions {
    /** Default limit for packet waits, 0 waits forever. @default 120000 ms */
    timeout?: number
    /** @default 10000 ms */
    connectTimeout?: number
    /** @default 759 */
    protocol?: number
    /** @default 2097151 */
    maxPacketLength?: number
    /** Opens the byte stream, TCP by default */
    dial?: Dialer
}

export interface WaitOptions {
    /** Overrides `ClientOptions.timeout` */
    timeout?: number
    signal?: AbortSignal
}

export interface LoginSuccess {
    uuid: string
    username: string
}

interface Events {
    packet: [packet: PacketReader]
    send: [buffer: Buffer]
    changeState: [state: State]
    error: [error: Error]
    end: []
}

const MAX_CHAT_LENGTH = 256

export function dialTcp(host: string, port: number, options: Pick<ClientOptions, "connectTimeout"> = {}) {
    return new Promise<Socket>((resolve, reject) => {
        const socket = new Socket
        const onError = (error: Error) => {
            socket.destroy()
            reject(new ConnectionError(`Failed to connect to ${host}:${port}`, { cause: error }))
        }
        socket.once("error", onError)
        if (options.connectTimeout) socket.setTimeout(options.connectTimeout, () => {
            socket.destroy()
            reject(new TimeoutError(`Connection to ${host}:${port} timed out`))
        })
        socket.connect({ host, port }, () => {
            socket.off("error", onError)
            socket.setTimeout(0)
            socket.setNoDelay(true)
            resolve(socket)
        })
    })
}

const defaultOptions: Required<ClientOptions> = {
    timeout: 120000,
    connectTimeout: 10000,
    protocol: PROTOCOL_VERSION,
    maxPacketLength: 2097151,
    dial: dialTcp
}

/**
 * A single session with a server. Not safe for concurrent use: callers await
 * one operation before starting the next.
 */
export class Connection extends Emitter<Events> {
    static async connect(host: string, port?: number | null, options?: ClientOptions) {
        const resolved = { ...defaultOptions, ...options }
        const address = await resolveAddress(host, port)
        const stream = await resolved.dial(address.host, address.port, resolved)
        return new Connection(address.host, address.port, stream, resolved)
    }

    state = State.Handshake
    phase = Phase.Fresh
    options: Required<ClientOptions>

    private stream: Duplex
    private reader: StreamReader

    constructor(readonly host: string, readonly port: number, stream: Duplex, options?: ClientOptions) {
        super()
        this.options = { ...defaultOptions, ...options }
        this.stream = stream
        this.reader = this.listen(stream)
    }

    /**
     * Dials a new stream when a handshake was already sent on the current
     * one, so every handshake starts on a clean socket.
     */
    async ensureFreshHandshake() {
        if (this.phase == Phase.Closed) throw new ConnectionError("Connection is closed")
        if (this.phase != Phase.HandshakeSent) return

        const previous = this.stream
        const stream = await this.options.dial(this.host, this.port, this.options)
        this.stream = stream
        this.reader = this.listen(stream)
        previous.destroy()

        this.phase = Phase.Fresh
        this.setState(State.Handshake)
    }

    async status() {
        await this.handshake(State.Status)
        await this.sendPacket(new PacketWriter(ids.statusRequest))
        return (await this.blockUntilPacketId(ids.statusResponse)).readString()
    }

    /** Resolves the round-trip time in milliseconds */
    async ping(payload = BigInt(Date.now())) {
        if (this.state != State.Status) throw new ProtocolError("Ping is only available in the status state")

        const start = Date.now()
        await this.sendPacket(new PacketWriter(ids.pingRequest).writeUInt64(payload))
        const pong = await this.blockUntilPacketId(ids.pingResponse)
        if (pong.readUInt64() != payload) throw new FramingError("Pong payload does not match ping")
        return Date.now() - start
    }

    async login(username: string): Promise<LoginSuccess> {
        await this.handshake(State.Login)
        await this.sendPacket(new PacketWriter(ids.loginStart)
            .writeString(username)
            .writeBool(false)) // no signature data

        const packet = await this.blockUntil([
            ids.loginDisconnect, ids.encryptionRequest, ids.loginSuccess, ids.setCompression
        ])

        switch (packet.id) {
            case ids.loginDisconnect:
                this.destroy()
                throw new DisconnectError(packet.readJSON())
            case ids.encryptionRequest:
                this.destroy()
                throw new ProtocolError("Server requested encryption, which is not supported")
            case ids.setCompression:
                this.destroy()
                throw new ProtocolError("Server enabled compression, which is not supported")
        }

        const uuid = formatUuid(packet.read(16))
        const name = packet.readString()
        this.setState(State.Play)
        return { uuid, username: name }
    }

    sendChatMessage(message: string, timestamp = BigInt(Date.now())) {
        if (this.state != State.Play) {
            return Promise.reject(new ProtocolError("Chat messages can only be sent in the play state"))
        }
        if (message.length > MAX_CHAT_LENGTH) {
            return Promise.reject(new EncodingError(`Chat message is longer than ${MAX_CHAT_LENGTH} characters`))
        }

        return this.sendPacket(new PacketWriter(ids.chatMessageS)
            .writeString(message)
            .writeUInt64(timestamp)
            .write(Buffer.alloc(8)) // salt
            .writeUInt8(0) // signature length
            .writeBool(false)) // signed preview
    }

    /** Answers the next keep-alive and resolves its id */
    async keepAlive(options?: WaitOptions) {
        const packet = await this.blockUntilPacketId(ids.keepAliveC, options)
        const id = packet.readUInt64()
        await this.sendPacket(new PacketWriter(ids.keepAliveS).writeUInt64(id))
        return id
    }

    sendPacket(packet: Packet) {
        const buffer = packet instanceof PacketWriter
            ? packet.encode()
            : packet instanceof PacketReader ? packet.buffer : packet

        if (this.phase == Phase.Closed) return Promise.reject(new ConnectionError("Connection is closed"))

        this.emit("send", buffer)
        const frame = Buffer.concat([encodeVarInt(buffer.length), buffer])

        const stream = this.stream
        return new Promise<void>((resolve, reject) => stream.write(frame, error => {
            if (!error) return resolve()
            if (this.stream == stream) this.destroy()
            reject(new ConnectionError("Failed to write packet", { cause: error }))
        }))
    }

    /**
     * Reads one frame. Resolves `null` when the length prefix runs past five
     * bytes, which callers treat as "no frame" and skip.
     */
    async readPacket(signal?: AbortSignal): Promise<PacketReader | null> {
        if (this.phase == Phase.Closed) throw new ConnectionError("Connection is closed")

        const packet = await this.readFrame(signal)
        if (!packet) return null

        // listeners must not break the read loop
        try {
            this.emit("packet", packet.clone())
        } catch (error) {
            this.emitError(error instanceof Error ? error : new Error(String(error)))
        }
        return packet
    }

    blockUntilPacketId(id: number, options?: WaitOptions) {
        return this.blockUntil([id], options)
    }

    async end(packet?: Packet) {
        if (packet) await this.sendPacket(packet)
        this.phase = Phase.Closed
        this.stream.end()
    }

    private async readFrame(signal?: AbortSignal) {
        const prefix: number[] = []
        try {
            let byte: number
            do {
                byte = await this.reader.readByte(signal)
                prefix.push(byte)
                if (prefix.length > MAX_VARINT_BYTES) return null
            } while (byte & 0x80)

            const [length] = decodeVarInt(Buffer.from(prefix))
            if (length < 0 || length > this.options.maxPacketLength) {
                // the body is left unread, so the next prefix cannot be found
                this.destroy()
                throw new FramingError(`Invalid packet length ${length}`)
            }

            const packet = new PacketReader(await this.reader.read(length, signal))
            packet.readProtocolId()
            return packet
        } catch (error) {
            // an abort after part of a frame was consumed leaves the stream misaligned
            if (error instanceof ConnectionError || (prefix.length > 0 && signal?.aborted)) this.destroy()
            throw error
        }
    }

    private async blockUntil(packetIds: number[], options: WaitOptions = {}) {
        const { timeout = this.options.timeout, signal } = options
        const controller = new AbortController()
        const forwardAbort = () => controller.abort(signal?.reason)

        if (signal?.aborted) forwardAbort()
        else signal?.addEventListener("abort", forwardAbort, { once: true })

        const timer = timeout > 0 ? setTimeout(() => controller.abort(new TimeoutError(
            `Timed out after ${timeout} ms waiting for packet ${packetIds.map(hex).join(", ")}`
        )), timeout) : undefined

        try {
            while (true) {
                const packet = await this.readPacket(controller.signal)
                if (packet?.id != null && packetIds.includes(packet.id)) return packet
            }
        } finally {
            clearTimeout(timer)
            signal?.removeEventListener("abort", forwardAbort)
        }
    }

    private async handshake(nextState: State.Status | State.Login) {
        await this.ensureFreshHandshake()
        await this.sendPacket(new PacketWriter(ids.handshake)
            .writeVarInt(this.options.protocol)
            .writeString(this.host)
            .writeUInt16(this.port)
            .writeVarInt(nextState))
        this.phase = Phase.HandshakeSent
        this.setState(nextState)
    }

    private listen(stream: Duplex) {
        if (stream instanceof Socket) stream.setNoDelay(true)

        stream.on("error", error => this.emitError(error))
        stream.once("close", () => {
            if (this.stream != stream) return
            // once a handshake was sent, the next one redials anyway
            if (this.phase == Phase.Fresh) this.phase = Phase.Closed
            this.emit("end")
        })
        return new StreamReader(stream)
    }

    private destroy() {
        this.phase = Phase.Closed
        this.stream.destroy()
    }

    private setState(state: State) {
        const oldState = this.state
        this.state = state
        if (oldState != state) this.emit("changeState", state)
    }

    protected emitError(error: Error) {
        if (!this.emit("error", error)) {
            console.error("Unhandled connection error", error)
        }
    }
}

function hex(id: number) {
    return "0x" + id.toString(16).padStart(2, "0")
}
