import { mkdir, writeFile } from 'fs/promises'
import path from 'path'
import type { ServiceConfig } from '../config.js'

export type FeatureBlock = {
  model: string
  enable: boolean
}

export type EngineConfigFile = {
  'device-mode': ServiceConfig['mineru']['deviceMode']
  'models-dir': string
  'table-config': FeatureBlock
  'formula-config': FeatureBlock
  'layout-config': FeatureBlock
}

export function buildEngineConfig(mineru: ServiceConfig['mineru']): EngineConfigFile {
  return {
    'device-mode': mineru.deviceMode,
    'models-dir': mineru.modelsDir,
    'table-config': { model: 'rapid_table', enable: mineru.tableEnabled },
    'formula-config': { model: 'unimernet_small', enable: mineru.formulaEnabled },
    'layout-config': { model: 'layoutlmv3', enable: true }
  }
}

export async function writeEngineConfig(mineru: ServiceConfig['mineru']) {
  const body = buildEngineConfig(mineru)
  await mkdir(path.dirname(mineru.configPath), { recursive: true })
  await writeFile(mineru.configPath, `${JSON.stringify(body, null, 4)}\n`, 'utf8')
  console.log(`[models] config written to ${mineru.configPath}`)
  return mineru.configPath
}
