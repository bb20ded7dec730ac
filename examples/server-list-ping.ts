import * as chat from "mc-chat-format"
import { Connection } from "../src"

const host = process.argv[2] || "localhost"
const port = +process.argv[3] || null

interface ServerStatus {
    version: { name: string, protocol: number }
    players: { max: number, online: number }
    description: chat.Component
}

async function main() {
    const connection = await Connection.connect(host, port)

    const status: ServerStatus = JSON.parse(await connection.status())
    const ping = await connection.ping()

    console.log("\n" + chat.format(status.description, { useAnsiCodes: true }))
    console.log(`\nVersion: ${status.version.name} (${status.version.protocol})`)
    console.log(`Players: ${status.players.online}/${status.players.max}`)
    console.log(`Ping:    ${ping} ms\n`)

    await connection.end()
}

main().catch(console.error)
