import { stat } from 'fs/promises'
import path from 'path'

// MFD = formula detection. All three are needed for a complete install;
// MFD + Layout are enough for the engine to start.
export const REQUIRED_MODELS = ['MFD', 'Layout', 'OCR'] as const
export const CORE_MODELS = ['MFD', 'Layout'] as const

async function isDirectory(target: string) {
  try {
    return (await stat(target)).isDirectory()
  } catch {
    return false
  }
}

async function missingFrom(modelsDir: string, names: readonly string[]) {
  if (!(await isDirectory(modelsDir))) return [...names]
  const missing: string[] = []
  for (const name of names) {
    if (!(await isDirectory(path.join(modelsDir, name)))) missing.push(name)
  }
  return missing
}

export function listMissingModels(modelsDir: string) {
  return missingFrom(modelsDir, REQUIRED_MODELS)
}

export async function hasRequiredModels(modelsDir: string) {
  return (await listMissingModels(modelsDir)).length === 0
}

export async function hasCoreModels(modelsDir: string) {
  return (await missingFrom(modelsDir, CORE_MODELS)).length === 0
}
