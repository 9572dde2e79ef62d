import { lookup } from 'dns/promises'
import * as readline from 'readline/promises'
import { CommanderError } from 'commander'
import { UDPTransport } from '@dgram-chat/shared'
import { ChatClient } from './client/ChatClient'
import { establishSession, isInputClosed, runMenu, type MenuIO } from './cli/menu'
import { parseClientConfig, type ClientConfig } from './config'
import { SessionStore } from './session/SessionStore'

function readConfig(): ClientConfig {
  try {
    return parseClientConfig(process.argv.slice(2))
  } catch (error) {
    // --help and --version also land here
    if (error instanceof CommanderError) process.exit(error.exitCode)
    throw error
  }
}

async function main() {
  const config = readConfig()

  // Replies come back from an IP, so compare against the resolved address
  const { address } = await lookup(config.host, { family: 4 })

  const transport = new UDPTransport('ChatClient')
  await transport.bind(0)

  const client = new ChatClient(transport, {
    server: { host: address, port: config.port },
    sessionStore: new SessionStore(config.sessionFile),
    maxRetries: config.maxRetries,
    timeoutMs: config.timeoutMs
  })

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout })
  const inputController = new AbortController()
  const io: MenuIO = {
    prompt: question => rl.question(question, { signal: inputController.signal }),
    print: line => console.log(line)
  }

  let stopping: Promise<void> | null = null
  const stop = () => {
    if (!stopping) {
      inputController.abort()
      rl.close()
      stopping = client.shutdown()
    }
    return stopping
  }

  const onSignal = () => {
    console.log('\nShutting down client...')
    stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('[Client] Error during shutdown:', error)
        process.exit(1)
      }
    )
  }
  rl.on('SIGINT', onSignal)
  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)

  console.log('============ Welcome to dgram-chat ============')
  try {
    if (await establishSession(client, io)) {
      await runMenu(client, io)
    }
  } catch (error) {
    if (!isInputClosed(error)) throw error
  }
  await stop()
}

if (require.main === module) {
  main().catch((error) => {
    console.error('[Client] Fatal:', error instanceof Error ? error.message : error)
    process.exit(1)
  })
}
