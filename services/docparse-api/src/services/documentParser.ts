import { errorMessage } from './commandRunner.js'
import { classifyDocument, type ParseMethod } from './documentKinds.js'
import type { EngineName, ParseEngine } from './parseEngine.js'

export type ParseInput = {
  buffer: Buffer
  fileName: string
  mimeType?: string | null
  method: ParseMethod
  lang?: string | null
}

export type ParseMetadata = {
  parse_method: ParseMethod
  ocr_applied: boolean
  pages: number
  processing_time_ms: number
  engine: EngineName
  fallback_used: boolean
  detected_type: string
}

export type ParseOutcome = {
  content: string
  metadata: ParseMetadata
}

export type EngineAttempt = {
  engine: EngineName
  unavailable: boolean
  message: string
}

export class ParseFailure extends Error {
  readonly attempts: EngineAttempt[]

  constructor(attempts: EngineAttempt[]) {
    super(attempts.map((attempt) => `${attempt.engine}: ${attempt.message}`).join('; ') || 'NO_ENGINE')
    this.name = 'ParseFailure'
    this.attempts = attempts
  }

  get allUnavailable() {
    return this.attempts.every((attempt) => attempt.unavailable)
  }
}

export type EngineState = 'available' | 'unavailable'

export type DocumentParser = {
  parse(input: ParseInput): Promise<ParseOutcome>
  engineStatus(): Promise<Partial<Record<EngineName, EngineState>>>
}

export function createDocumentParser(params: {
  primary: ParseEngine
  fallback: ParseEngine
}): DocumentParser {
  const engines = [params.primary, params.fallback]

  return {
    async parse(input) {
      const startedAt = Date.now()
      const kind = classifyDocument(input.mimeType, input.fileName)
      if (kind === 'unsupported') {
        throw new Error('UNSUPPORTED_FILE_TYPE')
      }

      const document = {
        buffer: input.buffer,
        fileName: input.fileName,
        mimeType: input.mimeType || null,
        kind
      }
      const attempts: EngineAttempt[] = []

      for (const engine of engines) {
        if (!engine.supports(kind)) continue

        if (!(await engine.isAvailable())) {
          attempts.push({ engine: engine.name, unavailable: true, message: 'ENGINE_UNAVAILABLE' })
          continue
        }

        try {
          const result = await engine.parse(document, { method: input.method, lang: input.lang })
          return {
            content: result.content,
            metadata: {
              parse_method: input.method,
              ocr_applied: result.ocrApplied,
              pages: result.pages,
              processing_time_ms: Date.now() - startedAt,
              engine: engine.name,
              fallback_used: engine !== params.primary,
              detected_type: result.detectedType
            }
          }
        } catch (error) {
          const message = errorMessage(error)
          console.warn(`[parse] engine=${engine.name} failed file=${input.fileName}: ${message}`)
          attempts.push({ engine: engine.name, unavailable: false, message })
        }
      }

      if (attempts.length === 0) {
        throw new Error('UNSUPPORTED_FILE_TYPE')
      }
      throw new ParseFailure(attempts)
    },

    async engineStatus() {
      const status: Partial<Record<EngineName, EngineState>> = {}
      for (const engine of engines) {
        status[engine.name] = (await engine.isAvailable()) ? 'available' : 'unavailable'
      }
      return status
    }
  }
}
