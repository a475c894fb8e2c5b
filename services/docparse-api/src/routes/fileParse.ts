import type { Request, Response } from 'express'
import { errorMessage } from '../services/commandRunner.js'
import { fileExtension } from '../services/documentKinds.js'
import type { DocumentParser } from '../services/documentParser.js'
import { sendParseError } from '../services/parseErrors.js'

// Legacy multi-file endpoint with the older response shape.
const LEGACY_EXTENSIONS = ['.pdf', '.png', '.jpg', '.jpeg', '.tiff', '.bmp']

export type LegacyParseResult = {
  md: string
  pages: number
  processing_time_ms: number
  ocr_applied: boolean
  tables_detected: number
  formulas_detected: number
}

export type LegacyFileEntry =
  | { filename: string; result: LegacyParseResult }
  | { filename: string; error: string }

function countChar(text: string, char: string) {
  return text.split(char).length - 1
}

function uploadedFiles(req: Request): Express.Multer.File[] {
  if (Array.isArray(req.files)) return req.files
  if (req.files) return Object.values(req.files).flat()
  return []
}

export function createFileParseHandler(parser: DocumentParser) {
  return async function fileParse(req: Request, res: Response) {
    const files = uploadedFiles(req)
    if (files.length === 0) {
      return sendParseError(res, 400, 'FILE_REQUIRED', 'files is required')
    }

    const results: LegacyFileEntry[] = []
    for (const file of files) {
      if (!file.originalname) continue

      const ext = fileExtension(file.originalname)
      if (!LEGACY_EXTENSIONS.includes(ext)) {
        results.push({ filename: file.originalname, error: `Unsupported file type: ${ext}` })
        continue
      }

      try {
        const outcome = await parser.parse({
          buffer: file.buffer,
          fileName: file.originalname,
          mimeType: file.mimetype,
          method: 'auto'
        })
        results.push({
          filename: file.originalname,
          result: {
            md: outcome.content,
            pages: outcome.metadata.pages,
            processing_time_ms: outcome.metadata.processing_time_ms,
            ocr_applied: outcome.metadata.ocr_applied,
            // Rough counts: table cell separators and math delimiters.
            tables_detected: countChar(outcome.content, '|'),
            formulas_detected: countChar(outcome.content, '$')
          }
        })
      } catch (error) {
        const message = errorMessage(error)
        console.error(`[file_parse] failed file=${file.originalname}`, message)
        results.push({ filename: file.originalname, error: message })
      }
    }

    return res.json(results)
  }
}
