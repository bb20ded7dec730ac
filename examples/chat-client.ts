import * as rl from "readline"
import { Connection } from "../src"

const host = process.argv[2] || "localhost"
const port = +process.argv[3] || null
const username = process.argv[4] || process.env.USERNAME || "Player"

async function main() {
    const client = await Connection.connect(host, port)

    if (process.env.DEBUG) {
        client.on("send", buffer => console.log(`[C] 0x${buffer[0].toString(16)} ${buffer.length}B`))
        client.on("packet", packet => console.log(`[S] 0x${packet.id?.toString(16)} ${packet.buffer.length}B`))
    }

    console.log(await client.status())

    const { uuid } = await client.login(username)
    console.log(`Logged in as ${username} (${uuid})`)

    const readline = rl.createInterface({
        input: process.stdin,
        output: process.stdout
    }).on("line", line => {
        if (!line) return
        client.sendChatMessage(line).catch(console.error)
    })
    client.on("end", () => readline.close())

    // the server drops clients that miss keep-alives
    while (true) await client.keepAlive({ timeout: 0 })
}

main().catch(error => {
    console.error(error)
    process.exit(1)
})
