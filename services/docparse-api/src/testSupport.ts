import { after } from 'node:test'
import { mkdir, mkdtemp, rm } from 'fs/promises'
import os from 'os'
import path from 'path'
import { loadServiceConfig, type ServiceConfig } from './config.js'
import type { CommandOptions, CommandRunner } from './services/commandRunner.js'

const tempDirs: string[] = []

// Removed once every test in the importing file has finished.
after(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })))
})

export async function makeTempDir(prefix = 'docparse-test-') {
  const dir = await mkdtemp(path.join(os.tmpdir(), prefix))
  tempDirs.push(dir)
  return dir
}

export async function makeModelDirs(modelsDir: string, names: string[]) {
  for (const name of names) {
    await mkdir(path.join(modelsDir, name), { recursive: true })
  }
}

export function makeTestConfig(root: string, env: NodeJS.ProcessEnv = {}): ServiceConfig {
  return loadServiceConfig({
    MINERU_MODELS_DIR: path.join(root, 'models'),
    MINERU_CONFIG_PATH: path.join(root, 'config', 'magic-pdf.json'),
    ...env
  })
}

export type RecordedCommand = {
  file: string
  args: string[]
  options?: CommandOptions
}

// Scripted stand-in for external tools: each handler gets the call and may
// create files the real tool would have produced.
export function scriptedRunner(handler: (call: RecordedCommand) => Promise<void> | void) {
  const calls: RecordedCommand[] = []
  const runner: CommandRunner = async (file, args, options) => {
    const call = { file, args, options }
    calls.push(call)
    await handler(call)
    return { stdout: '', stderr: '' }
  }
  return { runner, calls }
}

// Single-page PDF with one line of Helvetica text, offsets computed so the
// xref table is valid.
export function makeTextPdf(text: string) {
  const stream = `BT /F1 24 Tf 72 700 Td (${text}) Tj ET`
  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
    '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Contents 4 0 R /Resources << /Font << /F1 5 0 R >> >> >>',
    `<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`,
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>'
  ]

  let body = '%PDF-1.4\n'
  const offsets: number[] = []
  objects.forEach((object, index) => {
    offsets.push(body.length)
    body += `${index + 1} 0 obj\n${object}\nendobj\n`
  })

  const xrefOffset = body.length
  body += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`
  for (const offset of offsets) {
    body += `${String(offset).padStart(10, '0')} 00000 n \n`
  }
  body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`
  return Buffer.from(body, 'latin1')
}
