import type { DocumentKind, ParseMethod } from './documentKinds.js'

export type EngineName = 'mineru' | 'ocr-fallback'

export type SourceDocument = {
  buffer: Buffer
  fileName: string
  mimeType: string | null
  kind: DocumentKind
}

export type EngineParseOptions = {
  method: ParseMethod
  lang?: string | null
}

export type EngineResult = {
  content: string
  pages: number
  ocrApplied: boolean
  detectedType: string
}

export interface ParseEngine {
  readonly name: EngineName
  supports(kind: DocumentKind): boolean
  isAvailable(): Promise<boolean>
  parse(document: SourceDocument, options: EngineParseOptions): Promise<EngineResult>
}
