import * as chat from "mc-chat-format"

export class ProtocolError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options)
        this.name = "ProtocolError"
    }
}

/** Cursor or length overrun, oversized VarInt, malformed length prefix */
export class FramingError extends ProtocolError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options)
        this.name = "FramingError"
    }
}

/** Invalid UTF-8 or a value that does not fit its wire type */
export class EncodingError extends ProtocolError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options)
        this.name = "EncodingError"
    }
}

export class ConnectionError extends ProtocolError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options)
        this.name = "ConnectionError"
    }
}

export class UnexpectedEofError extends ConnectionError {
    constructor(message = "Stream ended before the packet was complete") {
        super(message)
        this.name = "UnexpectedEofError"
    }
}

export class TimeoutError extends ProtocolError {
    constructor(message: string) {
        super(message)
        this.name = "TimeoutError"
    }
}

export class DisconnectError extends ProtocolError {
    constructor(public reason: chat.Component) {
        super(`Disconnected by server: ${chat.format(reason)}`)
        this.name = "DisconnectError"
    }
}
