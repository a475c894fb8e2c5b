import { stat } from 'fs/promises'
import path from 'path'
import { createWorker, type Worker } from 'tesseract.js'
import { errorMessage } from './commandRunner.js'

export type OcrProviderConfig = {
  defaultLang: string
  tessdataDir: string | null
}

export type OcrProviderInput = {
  image: Buffer
  lang?: string | null
  config: OcrProviderConfig
}

export type OcrProviderOutput = {
  text: string
  confidence: number
}

const ISO_TO_TESSERACT: Record<string, string> = {
  en: 'eng',
  fr: 'fra',
  de: 'deu',
  es: 'spa',
  it: 'ita',
  pt: 'por',
  nl: 'nld',
  zh: 'chi_sim',
  ja: 'jpn',
  ko: 'kor',
  ar: 'ara',
  ru: 'rus'
}

// Accepts "fr", "fr-FR", "fra" or "eng+fra".
export function resolveOcrLanguage(lang: string | null | undefined, defaultLang: string) {
  const normalized = String(lang || '').trim().toLowerCase()
  if (!normalized) return defaultLang
  return normalized
    .split('+')
    .map((part) => {
      const base = part.trim().split(/[-_]/)[0]
      return ISO_TO_TESSERACT[base] || part.trim()
    })
    .filter(Boolean)
    .join('+')
}

const workers = new Map<string, Promise<Worker>>()

async function assertLocalLanguageData(lang: string, tessdataDir: string) {
  for (const code of lang.split('+')) {
    try {
      await stat(path.join(tessdataDir, `${code}.traineddata`))
    } catch {
      throw new Error(`OCR_WORKER_FAILED: no ${code}.traineddata in ${tessdataDir}`)
    }
  }
}

// createWorker never settles when language data fails to load; the error only
// reaches errorHandler, so it is turned into a rejection here.
async function startWorker(lang: string, config: OcrProviderConfig): Promise<Worker> {
  if (config.tessdataDir) {
    await assertLocalLanguageData(lang, config.tessdataDir)
  }

  return new Promise<Worker>((resolve, reject) => {
    let started = false
    const fail = (reason: unknown) => {
      const message = errorMessage(reason)
      if (started) {
        console.error(`[ocr] worker error lang=${lang}`, message)
        return
      }
      reject(new Error(`OCR_WORKER_FAILED: ${message}`))
    }

    createWorker(lang.split('+'), undefined, {
      ...(config.tessdataDir ? { langPath: config.tessdataDir, gzip: false } : {}),
      errorHandler: fail
    }).then((worker) => {
      started = true
      resolve(worker)
    }, fail)
  })
}

function getWorker(lang: string, config: OcrProviderConfig) {
  const existing = workers.get(lang)
  if (existing) return existing

  console.log(`[ocr] starting worker lang=${lang}`)
  const created = startWorker(lang, config)
  // A failed start must not poison the cache for later requests.
  void created.catch(() => workers.delete(lang))
  workers.set(lang, created)
  return created
}

export async function runOcrProvider(input: OcrProviderInput): Promise<OcrProviderOutput> {
  const lang = resolveOcrLanguage(input.lang, input.config.defaultLang)
  const worker = await getWorker(lang, input.config)
  const { data } = await worker.recognize(input.image)
  return { text: data.text, confidence: data.confidence }
}

export async function terminateOcrWorkers() {
  const pending = Array.from(workers.values())
  workers.clear()
  for (const entry of pending) {
    try {
      const worker = await entry
      await worker.terminate()
    } catch (error) {
      console.error('[ocr] worker shutdown failed', error instanceof Error ? error.message : error)
    }
  }
}
