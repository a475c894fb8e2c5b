import { PDFParse } from 'pdf-parse'
import mammoth from 'mammoth'
import * as XLSX from 'xlsx'
import { parse as parseCsv } from 'csv-parse/sync'
import type { DocumentKind } from './documentKinds.js'

export type PdfTextLayer = {
  pages: string[]
  pageCount: number
}

export type ExtractedText = {
  content: string
  pages: number
}

const EDGE_LINES = 3
const MIN_PAGES_FOR_REPEAT_DETECTION = 3
const REPEAT_RATIO = 0.6

function looksLikePageNumberLine(line: string) {
  const value = line.trim().toLowerCase()
  if (!value) return false
  if (/^-?\s*\d{1,4}\s*-?$/.test(value)) return true
  if (/^\d{1,4}\s*\/\s*\d{1,4}$/.test(value)) return true
  if (/^page\s+\d{1,4}(\s*(of|\/)\s*\d{1,4})?$/.test(value)) return true
  return false
}

function edgeLines(lines: string[]) {
  const nonEmpty = lines.filter(Boolean)
  return new Set([...nonEmpty.slice(0, EDGE_LINES), ...nonEmpty.slice(-EDGE_LINES)])
}

function removeRepeatedPdfHeaderFooter(pages: string[]) {
  const pageLines = pages.map((page) => page.split(/\r?\n/).map((line) => line.trim()))

  const repeated = new Set<string>()
  if (pages.length >= MIN_PAGES_FOR_REPEAT_DETECTION) {
    const counts = new Map<string, number>()
    for (const lines of pageLines) {
      for (const line of edgeLines(lines)) {
        counts.set(line, (counts.get(line) || 0) + 1)
      }
    }
    const threshold = Math.ceil(pages.length * REPEAT_RATIO)
    for (const [line, count] of counts) {
      if (count >= threshold) repeated.add(line)
    }
  }

  return pageLines.map((lines) => {
    const edges = edgeLines(lines)
    return lines
      .filter((line) => !(edges.has(line) && (repeated.has(line) || looksLikePageNumberLine(line))))
      .join('\n')
      .replace(/\n{3,}/g, '\n\n')
      .trim()
  })
}

function escapeCell(value: unknown) {
  return String(value ?? '').replace(/\r?\n/g, ' ').replace(/\|/g, '\\|').trim()
}

function toMarkdownTable(rows: unknown[][]) {
  const nonEmpty = rows.filter((row) => row.some((cell) => String(cell ?? '').trim() !== ''))
  if (nonEmpty.length === 0) return ''

  const width = Math.max(...nonEmpty.map((row) => row.length))
  const cells = nonEmpty.map((row) => Array.from({ length: width }, (_, index) => escapeCell(row[index])))
  const [head, ...body] = cells
  return [
    `| ${head.join(' | ')} |`,
    `| ${head.map(() => '---').join(' | ')} |`,
    ...body.map((row) => `| ${row.join(' | ')} |`)
  ].join('\n')
}

export async function extractPdfTextLayer(buffer: Buffer): Promise<PdfTextLayer> {
  const parser = new PDFParse({ data: buffer })
  try {
    const data = await parser.getText()
    const pages = removeRepeatedPdfHeaderFooter(data.pages.map((page) => page.text || ''))
    return { pages, pageCount: data.total || pages.length }
  } finally {
    await parser.destroy()
  }
}

export async function renderPdfPages(buffer: Buffer): Promise<Buffer[]> {
  const parser = new PDFParse({ data: buffer })
  try {
    const result = await parser.getScreenshot({ scale: 2, imageDataUrl: false })
    return result.pages.map((page) => Buffer.from(page.data))
  } finally {
    await parser.destroy()
  }
}

export async function extractStructuredText(buffer: Buffer, kind: DocumentKind): Promise<ExtractedText> {
  if (kind === 'txt' || kind === 'md') {
    return { content: buffer.toString('utf8'), pages: 1 }
  }

  if (kind === 'docx') {
    const data = await mammoth.extractRawText({ buffer })
    return { content: (data.value || '').trim(), pages: 1 }
  }

  if (kind === 'csv') {
    const parsed: unknown = parseCsv(buffer.toString('utf8'), { skip_empty_lines: true })
    const rows = Array.isArray(parsed) ? parsed.filter((row): row is unknown[] => Array.isArray(row)) : []
    return { content: toMarkdownTable(rows), pages: 1 }
  }

  if (kind === 'xlsx') {
    const workbook = XLSX.read(buffer, { type: 'buffer' })
    const sections = workbook.SheetNames.map((sheetName) => {
      const ws = workbook.Sheets[sheetName]
      const rows = XLSX.utils.sheet_to_json<unknown[]>(ws, { header: 1, raw: false })
      const table = toMarkdownTable(rows)
      return table ? `## ${sheetName}\n\n${table}` : `## ${sheetName}`
    })
    return { content: sections.join('\n\n'), pages: workbook.SheetNames.length }
  }

  throw new Error('UNSUPPORTED_FILE_TYPE')
}

export const __textExtractionTestables = {
  looksLikePageNumberLine,
  removeRepeatedPdfHeaderFooter,
  toMarkdownTable
}
