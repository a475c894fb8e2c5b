import type { ServiceConfig } from './config.js'
import { errorMessage, type CommandRunner } from './services/commandRunner.js'
import { writeEngineConfig } from './services/engineConfig.js'
import { provisionModels } from './services/modelProvisioning.js'
import { hasCoreModels } from './services/modelStore.js'

export type RuntimeState = {
  configPath: string
  modelsReady: boolean
}

export async function prepareRuntime(config: ServiceConfig, options: { runner?: CommandRunner } = {}): Promise<RuntimeState> {
  const mineru = config.mineru
  console.log(`[startup] checking models directory: ${mineru.modelsDir}`)

  const configPath = await writeEngineConfig(mineru)

  if (await hasCoreModels(mineru.modelsDir)) {
    console.log('[startup] models found - full parsing available')
    return { configPath, modelsReady: true }
  }

  if (!mineru.downloadOnStart) {
    console.warn('[startup] models NOT found - OCR fallback will be used')
    console.warn('[startup] to enable full parsing, run: npm run download-models')
    return { configPath, modelsReady: false }
  }

  console.warn('[startup] models NOT found - starting download')
  try {
    await provisionModels(mineru, { runner: options.runner })
  } catch (error) {
    console.warn('[startup] model download failed, serving in OCR-only mode:', errorMessage(error))
    return { configPath, modelsReady: false }
  }

  return { configPath, modelsReady: await hasCoreModels(mineru.modelsDir) }
}
