import test from 'node:test'
import assert from 'node:assert/strict'
import path from 'path'
import { makeTempDir, makeTestConfig, makeTextPdf, scriptedRunner } from '../testSupport.js'
import type { DocumentKind } from './documentKinds.js'
import { createDocumentParser, ParseFailure } from './documentParser.js'
import { createFallbackEngine } from './fallbackEngine.js'
import { createMineruEngine } from './mineruEngine.js'
import type { EngineName, EngineResult, ParseEngine } from './parseEngine.js'

type StubBehavior = {
  available?: boolean
  kinds?: DocumentKind[]
  result?: EngineResult
  error?: string
}

function stubEngine(name: EngineName, behavior: StubBehavior) {
  const seen = { calls: 0 }
  const engine: ParseEngine = {
    name,
    supports: (kind) => (behavior.kinds || ['pdf', 'image']).includes(kind),
    isAvailable: async () => behavior.available ?? true,
    parse: async () => {
      seen.calls += 1
      if (behavior.error) throw new Error(behavior.error)
      return behavior.result || { content: `${name} output`, pages: 1, ocrApplied: false, detectedType: 'txt' }
    }
  }
  return { engine, seen }
}

const pdfInput = {
  buffer: Buffer.from('%PDF-1.4'),
  fileName: 'report.pdf',
  mimeType: 'application/pdf',
  method: 'auto' as const
}

test('primary engine result is returned with metadata', async () => {
  const primary = stubEngine('mineru', {
    result: { content: '# Report', pages: 4, ocrApplied: false, detectedType: 'txt' }
  })
  const fallback = stubEngine('ocr-fallback', {})
  const parser = createDocumentParser({ primary: primary.engine, fallback: fallback.engine })

  const outcome = await parser.parse(pdfInput)

  assert.equal(outcome.content, '# Report')
  assert.equal(outcome.metadata.parse_method, 'auto')
  assert.equal(outcome.metadata.pages, 4)
  assert.equal(outcome.metadata.ocr_applied, false)
  assert.equal(outcome.metadata.engine, 'mineru')
  assert.equal(outcome.metadata.fallback_used, false)
  assert.equal(outcome.metadata.detected_type, 'txt')
  assert.ok(outcome.metadata.processing_time_ms >= 0)
  assert.equal(fallback.seen.calls, 0)
})

test('a failing primary engine falls back once', async () => {
  const primary = stubEngine('mineru', { error: 'MINERU_FAILED: boom' })
  const fallback = stubEngine('ocr-fallback', {
    result: { content: 'ocr text', pages: 2, ocrApplied: true, detectedType: 'ocr' }
  })
  const parser = createDocumentParser({ primary: primary.engine, fallback: fallback.engine })

  const outcome = await parser.parse({ ...pdfInput, method: 'ocr' })

  assert.equal(outcome.content, 'ocr text')
  assert.equal(outcome.metadata.engine, 'ocr-fallback')
  assert.equal(outcome.metadata.fallback_used, true)
  assert.equal(outcome.metadata.ocr_applied, true)
  assert.equal(primary.seen.calls, 1)
  assert.equal(fallback.seen.calls, 1)
})

test('an unavailable primary engine is skipped without being called', async () => {
  const primary = stubEngine('mineru', { available: false })
  const fallback = stubEngine('ocr-fallback', {})
  const parser = createDocumentParser({ primary: primary.engine, fallback: fallback.engine })

  const outcome = await parser.parse(pdfInput)

  assert.equal(outcome.metadata.engine, 'ocr-fallback')
  assert.equal(primary.seen.calls, 0)
})

test('both engines failing raises ParseFailure with every attempt', async () => {
  const primary = stubEngine('mineru', { error: 'MINERU_FAILED: boom' })
  const fallback = stubEngine('ocr-fallback', { error: 'PDF_RENDER_EMPTY' })
  const parser = createDocumentParser({ primary: primary.engine, fallback: fallback.engine })

  await assert.rejects(parser.parse(pdfInput), (error: unknown) => {
    assert.ok(error instanceof ParseFailure)
    assert.equal(error.allUnavailable, false)
    assert.equal(error.message, 'mineru: MINERU_FAILED: boom; ocr-fallback: PDF_RENDER_EMPTY')
    return true
  })
})

test('no available engine is reported as unavailable', async () => {
  const primary = stubEngine('mineru', { available: false })
  const fallback = stubEngine('ocr-fallback', { available: false })
  const parser = createDocumentParser({ primary: primary.engine, fallback: fallback.engine })

  await assert.rejects(parser.parse(pdfInput), (error: unknown) => {
    assert.ok(error instanceof ParseFailure)
    assert.equal(error.allUnavailable, true)
    return true
  })
})

test('unsupported uploads are rejected before any engine runs', async () => {
  const primary = stubEngine('mineru', {})
  const fallback = stubEngine('ocr-fallback', {})
  const parser = createDocumentParser({ primary: primary.engine, fallback: fallback.engine })

  await assert.rejects(parser.parse({ ...pdfInput, fileName: 'tool.exe', mimeType: 'application/octet-stream' }), /UNSUPPORTED_FILE_TYPE/)
  await assert.rejects(parser.parse({ ...pdfInput, fileName: 'deck.pptx', mimeType: null }), /UNSUPPORTED_FILE_TYPE/)
  assert.equal(primary.seen.calls + fallback.seen.calls, 0)
})

test('engine status lists each engine', async () => {
  const primary = stubEngine('mineru', { available: false })
  const fallback = stubEngine('ocr-fallback', {})
  const parser = createDocumentParser({ primary: primary.engine, fallback: fallback.engine })

  assert.deepEqual(await parser.engineStatus(), { mineru: 'unavailable', 'ocr-fallback': 'available' })
})

test('missing models still serve OCR results through the fallback', async () => {
  const root = await makeTempDir()
  const config = makeTestConfig(root, { MINERU_MODELS_DIR: path.join(root, 'absent') })
  const { runner, calls } = scriptedRunner(() => undefined)
  const parser = createDocumentParser({
    primary: createMineruEngine({ mineru: config.mineru, office: config.office, runner }),
    fallback: createFallbackEngine({
      ocr: config.ocr,
      deps: {
        extractTextLayer: async () => ({ pages: [''], pageCount: 1 }),
        extractStructured: async () => ({ content: '', pages: 1 }),
        ocr: {
          renderPages: async () => [Buffer.from('png')],
          recognize: async () => ({ text: 'Scanned invoice 42', confidence: 88 })
        }
      }
    })
  })

  const outcome = await parser.parse({ ...pdfInput, method: 'ocr' })

  assert.equal(outcome.content, 'Scanned invoice 42')
  assert.equal(outcome.metadata.ocr_applied, true)
  assert.equal(outcome.metadata.engine, 'ocr-fallback')
  assert.equal(calls.length, 0)
})

test('a text PDF parses through the real fallback without models', async () => {
  const root = await makeTempDir()
  const config = makeTestConfig(root, { MINERU_MODELS_DIR: path.join(root, 'absent') })
  const { runner, calls } = scriptedRunner(() => undefined)
  const parser = createDocumentParser({
    primary: createMineruEngine({ mineru: config.mineru, office: config.office, runner }),
    fallback: createFallbackEngine({ ocr: config.ocr })
  })

  const outcome = await parser.parse({ ...pdfInput, buffer: makeTextPdf('Quarterly revenue grew'), method: 'txt' })

  assert.equal(outcome.content, 'Quarterly revenue grew')
  assert.equal(outcome.metadata.ocr_applied, false)
  assert.equal(outcome.metadata.pages, 1)
  assert.equal(outcome.metadata.engine, 'ocr-fallback')
  assert.equal(outcome.metadata.fallback_used, true)
  assert.equal(calls.length, 0)
})

test('pptx without models is reported as engine unavailable', async () => {
  const root = await makeTempDir()
  const config = makeTestConfig(root, { MINERU_MODELS_DIR: path.join(root, 'absent') })
  const { runner } = scriptedRunner(() => undefined)
  const parser = createDocumentParser({
    primary: createMineruEngine({ mineru: config.mineru, office: config.office, runner }),
    fallback: createFallbackEngine({ ocr: config.ocr })
  })

  await assert.rejects(parser.parse({ ...pdfInput, fileName: 'deck.pptx', mimeType: null }), (error: unknown) => {
    assert.ok(error instanceof ParseFailure)
    assert.equal(error.allUnavailable, true)
    assert.equal(error.message, 'mineru: ENGINE_UNAVAILABLE')
    return true
  })
})
