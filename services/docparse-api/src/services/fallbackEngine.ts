import type { ServiceConfig } from '../config.js'
import type { DocumentKind } from './documentKinds.js'
import { defaultOcrPipelineDeps, runImageOcr, runPdfOcr, type OcrPipelineDeps } from './ocrPipeline.js'
import type { EngineParseOptions, EngineResult, ParseEngine, SourceDocument } from './parseEngine.js'
import { extractPdfTextLayer, extractStructuredText, type ExtractedText, type PdfTextLayer } from './textExtraction.js'

const SUPPORTED_KINDS: DocumentKind[] = ['pdf', 'image', 'docx', 'xlsx', 'csv', 'md', 'txt']

// Below this a PDF is treated as scanned in auto mode.
export const MIN_TEXT_CHARS_PER_PAGE = 16

export type FallbackEngineDeps = {
  extractTextLayer: (pdf: Buffer) => Promise<PdfTextLayer>
  extractStructured: (buffer: Buffer, kind: DocumentKind) => Promise<ExtractedText>
  ocr: OcrPipelineDeps
}

export const defaultFallbackDeps: FallbackEngineDeps = {
  extractTextLayer: extractPdfTextLayer,
  extractStructured: extractStructuredText,
  ocr: defaultOcrPipelineDeps
}

function textLayerCharCount(layer: PdfTextLayer) {
  return layer.pages.join('').replace(/\s+/g, '').length
}

export function createFallbackEngine(params: {
  ocr: ServiceConfig['ocr']
  deps?: FallbackEngineDeps
}): ParseEngine {
  const deps = params.deps || defaultFallbackDeps
  const ocrConfig = params.ocr

  async function ocrPdf(document: SourceDocument, options: EngineParseOptions): Promise<EngineResult> {
    const result = await runPdfOcr({ pdf: document.buffer, lang: options.lang, config: ocrConfig, deps: deps.ocr })
    return { content: result.text, pages: result.pages, ocrApplied: true, detectedType: 'ocr' }
  }

  async function parsePdf(document: SourceDocument, options: EngineParseOptions): Promise<EngineResult> {
    if (options.method === 'ocr') {
      return ocrPdf(document, options)
    }

    const layer = await deps.extractTextLayer(document.buffer)
    const textResult: EngineResult = {
      content: layer.pages.filter(Boolean).join('\n\n'),
      pages: layer.pageCount,
      ocrApplied: false,
      detectedType: 'txt'
    }
    if (options.method === 'txt') {
      return textResult
    }

    const pageCount = Math.max(layer.pageCount, 1)
    if (textLayerCharCount(layer) / pageCount >= MIN_TEXT_CHARS_PER_PAGE) {
      return textResult
    }

    console.log(`[ocr] text layer too thin (${textLayerCharCount(layer)} chars / ${pageCount} pages), running OCR`)
    return ocrPdf(document, options)
  }

  return {
    name: 'ocr-fallback',

    supports(kind) {
      return SUPPORTED_KINDS.includes(kind)
    },

    async isAvailable() {
      return true
    },

    async parse(document, options) {
      if (document.kind === 'pdf') {
        return parsePdf(document, options)
      }

      if (document.kind === 'image') {
        const result = await runImageOcr({ image: document.buffer, lang: options.lang, config: ocrConfig, deps: deps.ocr })
        return { content: result.text, pages: 1, ocrApplied: true, detectedType: 'ocr' }
      }

      const extracted = await deps.extractStructured(document.buffer, document.kind)
      return { content: extracted.content, pages: extracted.pages, ocrApplied: false, detectedType: document.kind }
    }
  }
}
