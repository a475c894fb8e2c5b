import { randomUUID } from 'crypto'
import { cp, mkdir, rename, rm, stat } from 'fs/promises'
import os from 'os'
import path from 'path'
import type { ServiceConfig } from '../config.js'
import { commandExists, runCommand, type CommandRunner } from './commandRunner.js'
import { writeEngineConfig } from './engineConfig.js'
import { hasRequiredModels } from './modelStore.js'

export type ProvisionResult = {
  downloaded: boolean
  modelsDir: string
  configPath: string
}

export type ProvisionOptions = {
  force?: boolean
  runner?: CommandRunner
  tmpRoot?: string
}

async function exists(target: string) {
  try {
    await stat(target)
    return true
  } catch {
    return false
  }
}

function isCrossDeviceError(error: unknown) {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'EXDEV'
}

// The models dir usually sits on a mounted disk while the clone lands in the
// OS temp dir, so rename can fail with EXDEV.
async function moveDirectory(from: string, to: string) {
  try {
    await rename(from, to)
  } catch (error) {
    if (!isCrossDeviceError(error)) throw error
    await cp(from, to, { recursive: true })
    await rm(from, { recursive: true, force: true })
  }
}

export async function downloadModels(mineru: ServiceConfig['mineru'], options: ProvisionOptions = {}) {
  const runner = options.runner || runCommand
  const modelsDir = mineru.modelsDir
  console.log(`[models] downloading models to ${modelsDir}`)

  if (!(await commandExists(runner, 'git', ['lfs', 'version']))) {
    throw new Error('GIT_LFS_NOT_INSTALLED')
  }

  await mkdir(path.dirname(modelsDir), { recursive: true })

  const cloneDir = path.join(options.tmpRoot || os.tmpdir(), `model-clone-${randomUUID()}`)
  try {
    console.log(`[models] cloning ${mineru.hfRepo}`)
    await runner('git', ['clone', '--depth', '1', `https://huggingface.co/${mineru.hfRepo}`, cloneDir])

    const sourceModels = path.join(cloneDir, 'models')
    if (!(await exists(sourceModels))) {
      throw new Error(`MODELS_NOT_FOUND_IN_REPO: ${cloneDir}`)
    }

    await rm(modelsDir, { recursive: true, force: true })
    await moveDirectory(sourceModels, modelsDir)
    console.log(`[models] models installed to ${modelsDir}`)
  } finally {
    await rm(cloneDir, { recursive: true, force: true })
  }
}

export async function provisionModels(mineru: ServiceConfig['mineru'], options: ProvisionOptions = {}): Promise<ProvisionResult> {
  let downloaded = false
  if (options.force || !(await hasRequiredModels(mineru.modelsDir))) {
    await downloadModels(mineru, options)
    downloaded = true
  } else {
    console.log(`[models] all models found in ${mineru.modelsDir}`)
  }

  const configPath = await writeEngineConfig(mineru)
  console.log('[models] ready')
  return { downloaded, modelsDir: mineru.modelsDir, configPath }
}
