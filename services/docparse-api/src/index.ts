import 'dotenv/config'
import { createApp } from './app.js'
import { loadServiceConfig } from './config.js'
import { errorMessage } from './services/commandRunner.js'
import { createDocumentParser } from './services/documentParser.js'
import { createFallbackEngine } from './services/fallbackEngine.js'
import { createMineruEngine } from './services/mineruEngine.js'
import { terminateOcrWorkers } from './services/ocrProvider.js'
import { prepareRuntime } from './startup.js'

async function main() {
  const config = loadServiceConfig()
  const runtime = await prepareRuntime(config)

  const parser = createDocumentParser({
    primary: createMineruEngine({ mineru: config.mineru, office: config.office }),
    fallback: createFallbackEngine({ ocr: config.ocr })
  })
  const app = createApp({ config, parser })

  const server = app.listen(config.port, '0.0.0.0', () => {
    const mode = runtime.modelsReady ? 'full' : 'ocr-only'
    console.log(`[server] docparse api listening on :${config.port} mode=${mode}`)
  })

  const shutdown = async (signal: string) => {
    console.log(`[server] ${signal} received, shutting down`)
    server.close()
    await terminateOcrWorkers()
    process.exit(0)
  }

  process.on('SIGINT', () => void shutdown('SIGINT'))
  process.on('SIGTERM', () => void shutdown('SIGTERM'))
}

main().catch((error: unknown) => {
  console.error('[server] failed to start:', errorMessage(error))
  process.exit(1)
})
