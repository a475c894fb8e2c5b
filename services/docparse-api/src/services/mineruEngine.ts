import { randomUUID } from 'crypto'
import { mkdir, readFile, readdir, rm, writeFile } from 'fs/promises'
import os from 'os'
import path from 'path'
import type { ServiceConfig } from '../config.js'
import { commandExists, errorMessage, runCommand, type CommandRunner } from './commandRunner.js'
import { fileExtension, isOfficeKind, type DocumentKind } from './documentKinds.js'
import { hasCoreModels } from './modelStore.js'
import { convertOfficeToPdf } from './officeConverter.js'
import type { EngineParseOptions, EngineResult, ParseEngine, SourceDocument } from './parseEngine.js'

const SUPPORTED_KINDS: DocumentKind[] = ['pdf', 'image', 'docx', 'xlsx', 'pptx']
const INPUT_STEM = 'document'

const ISO_TO_MINERU: Record<string, string> = {
  en: 'en',
  zh: 'ch',
  ja: 'japan',
  ko: 'korean',
  ru: 'east_slavic',
  ar: 'arabic',
  fr: 'latin',
  de: 'latin',
  es: 'latin',
  it: 'latin',
  pt: 'latin',
  nl: 'latin'
}

export function resolveMineruLanguage(lang: string | null | undefined) {
  const normalized = String(lang || '').trim().toLowerCase()
  if (!normalized) return null
  const base = normalized.split(/[-_]/)[0]
  return ISO_TO_MINERU[base] || normalized
}

type MiddleSummary = {
  parseType: string | null
  pages: number | null
}

function summarizeMiddleJson(raw: string): MiddleSummary {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    return { parseType: null, pages: null }
  }
  if (!parsed || typeof parsed !== 'object') return { parseType: null, pages: null }

  const parseType = '_parse_type' in parsed && typeof parsed._parse_type === 'string' ? parsed._parse_type : null
  const pages = 'pdf_info' in parsed && Array.isArray(parsed.pdf_info) ? parsed.pdf_info.length : null
  return { parseType, pages }
}

async function findOutputFile(root: string, fileName: string) {
  const entries = await readdir(root, { recursive: true })
  const match = entries.find((entry) => path.basename(entry) === fileName)
  return match ? path.join(root, match) : null
}

export function createMineruEngine(params: {
  mineru: ServiceConfig['mineru']
  office: ServiceConfig['office']
  runner?: CommandRunner
  tmpRoot?: string
}): ParseEngine {
  const runner = params.runner || runCommand
  const { mineru } = params
  let binaryFound = false

  async function prepareInput(document: SourceDocument, workDir: string) {
    const ext = document.kind === 'pdf' ? '.pdf' : fileExtension(document.fileName) || '.bin'
    const inputPath = path.join(workDir, `${INPUT_STEM}${ext}`)
    await writeFile(inputPath, document.buffer)

    if (!isOfficeKind(document.kind)) return inputPath

    const converted = await convertOfficeToPdf({
      inputPath,
      workDir,
      config: { sofficeBin: params.office.sofficeBin, timeoutMs: mineru.timeoutMs },
      runner
    })
    return converted.pdfPath
  }

  return {
    name: 'mineru',

    supports(kind) {
      return SUPPORTED_KINDS.includes(kind)
    },

    async isAvailable() {
      if (!(await hasCoreModels(mineru.modelsDir))) return false
      // Only a successful probe is cached; a failed one is retried next time.
      if (!binaryFound) {
        binaryFound = await commandExists(runner, mineru.bin)
      }
      return binaryFound
    },

    async parse(document: SourceDocument, options: EngineParseOptions): Promise<EngineResult> {
      const workDir = path.join(params.tmpRoot || os.tmpdir(), `mineru-${randomUUID()}`)
      const outputDir = path.join(workDir, 'output')
      await mkdir(outputDir, { recursive: true })

      try {
        const inputPath = await prepareInput(document, workDir)
        const args = ['-p', inputPath, '-o', outputDir, '-b', mineru.backend, '-m', options.method]
        const lang = resolveMineruLanguage(options.lang)
        if (lang) args.push('-l', lang)

        try {
          await runner(mineru.bin, args, {
            timeoutMs: mineru.timeoutMs,
            env: {
              MINERU_TOOLS_CONFIG_JSON: mineru.configPath,
              MINERU_MODEL_SOURCE: 'local'
            }
          })
        } catch (error) {
          throw new Error(`MINERU_FAILED: ${errorMessage(error)}`)
        }

        const markdownPath = await findOutputFile(outputDir, `${INPUT_STEM}.md`)
        if (!markdownPath) {
          throw new Error('MINERU_OUTPUT_MISSING')
        }
        const content = await readFile(markdownPath, 'utf8')

        const middlePath = path.join(path.dirname(markdownPath), `${INPUT_STEM}_middle.json`)
        const middle = await readFile(middlePath, 'utf8')
          .then(summarizeMiddleJson)
          .catch((): MiddleSummary => ({ parseType: null, pages: null }))

        const detectedType = middle.parseType || (options.method === 'auto' ? 'unknown' : options.method)
        return {
          content,
          pages: middle.pages ?? 1,
          ocrApplied: options.method === 'ocr' || detectedType === 'ocr',
          detectedType
        }
      } finally {
        await rm(workDir, { recursive: true, force: true })
      }
    }
  }
}
