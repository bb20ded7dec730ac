import { promises as dns, type SrvRecord } from "dns"

export const DEFAULT_PORT = 25565

export interface Address {
    host: string
    port: number
}

/**
 * Looks up the `_minecraft._tcp` SRV record when no port is given and the
 * host is a domain name. Falls back to the default port.
 */
export async function resolveAddress(host: string, port?: number | null): Promise<Address> {
    if (port) return { host, port }

    const isIp = host.includes(":") || /^([0-9]+\.){3}[0-9]+$/.test(host)
    const isDomain = !isIp && /^([\w-]+\.)+[\w-]+\.?$/i.test(host)
    if (!isDomain) return { host, port: DEFAULT_PORT }

    const records = await dns.resolveSrv("_minecraft._tcp." + host).catch((): SrvRecord[] => [])
    if (records.length == 0) return { host, port: DEFAULT_PORT }
    return { host: records[0].name, port: records[0].port }
}

/** Formats 16 raw bytes as a dashed hex UUID */
export function formatUuid(bytes: Uint8Array) {
    if (bytes.length != 16) throw new RangeError(`UUID must be 16 bytes, got ${bytes.length}`)
    const hex = Buffer.from(bytes).toString("hex")
    return [hex.slice(0, 8), hex.slice(8, 12), hex.slice(12, 16), hex.slice(16, 20), hex.slice(20)].join("-")
}
