import test from 'node:test'
import assert from 'node:assert/strict'
import type { DocumentKind } from './documentKinds.js'
import { createFallbackEngine, type FallbackEngineDeps } from './fallbackEngine.js'
import type { OcrProviderInput } from './ocrProvider.js'
import type { SourceDocument } from './parseEngine.js'
import type { PdfTextLayer } from './textExtraction.js'

const ocrConfig = { defaultLang: 'eng', tessdataDir: null }

function fakeDeps(layer: PdfTextLayer) {
  const recognized: OcrProviderInput[] = []
  const structured: DocumentKind[] = []
  const seen = { render: 0, recognized, structured }
  const deps: FallbackEngineDeps = {
    extractTextLayer: async () => layer,
    extractStructured: async (_buffer, kind) => {
      seen.structured.push(kind)
      return { content: `structured ${kind}`, pages: 1 }
    },
    ocr: {
      renderPages: async () => {
        seen.render += 1
        return [Buffer.from('page-1'), Buffer.from('page-2')]
      },
      recognize: async (input) => {
        seen.recognized.push(input)
        return { text: `  text of ${input.image.toString()}  `, confidence: 91 }
      }
    }
  }
  return { deps, seen }
}

function doc(kind: DocumentKind, fileName: string): SourceDocument {
  return { buffer: Buffer.from('%PDF-1.4 fake'), fileName, mimeType: null, kind }
}

const textLayer: PdfTextLayer = {
  pages: ['Quarterly results improved across all regions.', 'Revenue grew by twelve percent year over year.'],
  pageCount: 2
}

test('txt method returns the text layer without OCR', async () => {
  const { deps, seen } = fakeDeps(textLayer)
  const engine = createFallbackEngine({ ocr: ocrConfig, deps })

  const result = await engine.parse(doc('pdf', 'report.pdf'), { method: 'txt' })

  assert.equal(result.content, 'Quarterly results improved across all regions.\n\nRevenue grew by twelve percent year over year.')
  assert.equal(result.pages, 2)
  assert.equal(result.ocrApplied, false)
  assert.equal(result.detectedType, 'txt')
  assert.equal(seen.render, 0)
  assert.equal(seen.recognized.length, 0)
})

test('txt method never falls back to OCR even for an empty text layer', async () => {
  const { deps, seen } = fakeDeps({ pages: ['', ''], pageCount: 2 })
  const engine = createFallbackEngine({ ocr: ocrConfig, deps })

  const result = await engine.parse(doc('pdf', 'scan.pdf'), { method: 'txt' })

  assert.equal(result.content, '')
  assert.equal(result.ocrApplied, false)
  assert.equal(seen.recognized.length, 0)
})

test('ocr method renders every page and marks OCR as applied', async () => {
  const { deps, seen } = fakeDeps(textLayer)
  const engine = createFallbackEngine({ ocr: ocrConfig, deps })

  const result = await engine.parse(doc('pdf', 'scan.pdf'), { method: 'ocr', lang: 'fr' })

  assert.equal(result.content, 'text of page-1\n\ntext of page-2')
  assert.equal(result.pages, 2)
  assert.equal(result.ocrApplied, true)
  assert.equal(result.detectedType, 'ocr')
  assert.deepEqual(seen.recognized.map((input) => input.lang), ['fr', 'fr'])
})

test('auto method keeps a rich text layer', async () => {
  const { deps, seen } = fakeDeps(textLayer)
  const engine = createFallbackEngine({ ocr: ocrConfig, deps })

  const result = await engine.parse(doc('pdf', 'report.pdf'), { method: 'auto' })

  assert.equal(result.ocrApplied, false)
  assert.equal(seen.render, 0)
})

test('auto method switches to OCR for a scanned pdf', async () => {
  const { deps, seen } = fakeDeps({ pages: ['', '12'], pageCount: 2 })
  const engine = createFallbackEngine({ ocr: ocrConfig, deps })

  const result = await engine.parse(doc('pdf', 'scan.pdf'), { method: 'auto' })

  assert.equal(result.ocrApplied, true)
  assert.equal(result.content, 'text of page-1\n\ntext of page-2')
  assert.equal(seen.render, 1)
})

test('images are always OCRed', async () => {
  const { deps, seen } = fakeDeps(textLayer)
  const engine = createFallbackEngine({ ocr: ocrConfig, deps })

  const result = await engine.parse(doc('image', 'receipt.png'), { method: 'txt' })

  assert.equal(result.content, 'text of %PDF-1.4 fake')
  assert.equal(result.pages, 1)
  assert.equal(result.ocrApplied, true)
  assert.equal(seen.render, 0)
})

test('office and text documents use structured extraction', async () => {
  const { deps, seen } = fakeDeps(textLayer)
  const engine = createFallbackEngine({ ocr: ocrConfig, deps })

  const result = await engine.parse(doc('docx', 'memo.docx'), { method: 'auto' })

  assert.deepEqual(result, { content: 'structured docx', pages: 1, ocrApplied: false, detectedType: 'docx' })
  assert.deepEqual(seen.structured, ['docx'])
  assert.equal(engine.supports('pptx'), false)
  assert.equal(await engine.isAvailable(), true)
})
