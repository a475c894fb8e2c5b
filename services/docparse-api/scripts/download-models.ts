import 'dotenv/config'
import process from 'process'
import { loadServiceConfig } from '../src/config.js'
import { errorMessage } from '../src/services/commandRunner.js'
import { provisionModels } from '../src/services/modelProvisioning.js'

// Usage: tsx scripts/download-models.ts [--force]
async function run() {
  const force = process.argv.slice(2).includes('--force')
  const config = loadServiceConfig()
  const result = await provisionModels(config.mineru, { force })
  console.log(`[models] ${result.downloaded ? 'downloaded' : 'kept existing'} models in ${result.modelsDir}`)
}

run().catch((error: unknown) => {
  console.error('[models] failed:', errorMessage(error))
  process.exit(1)
})
