import type { Request, Response } from 'express'
import { z } from 'zod'
import { PARSE_METHODS } from '../services/documentKinds.js'
import type { DocumentParser } from '../services/documentParser.js'
import { sendParseError, sendParseFailure } from '../services/parseErrors.js'

const blankToUndefined = (value: unknown) => {
  if (typeof value !== 'string') return value
  const trimmed = value.trim()
  return trimmed ? trimmed.toLowerCase() : undefined
}

const parseFormSchema = z.object({
  parse_method: z.preprocess(blankToUndefined, z.enum(PARSE_METHODS).default('auto')),
  lang: z.preprocess(blankToUndefined, z.string().max(32).optional())
})

export function createParseHandler(parser: DocumentParser) {
  return async function parseUpload(req: Request, res: Response) {
    const file = req.file
    if (!file || !file.originalname) {
      return sendParseError(res, 400, 'FILE_REQUIRED', 'file is required')
    }

    const form = parseFormSchema.safeParse(req.body ?? {})
    if (!form.success) {
      const field = form.error.issues[0]?.path.join('.') || 'form'
      const code = field === 'parse_method' ? 'INVALID_PARSE_METHOD' : 'VALIDATION_ERROR'
      return sendParseError(res, 400, code, `${field}: ${form.error.issues[0]?.message || 'invalid value'}`)
    }

    try {
      const outcome = await parser.parse({
        buffer: file.buffer,
        fileName: file.originalname,
        mimeType: file.mimetype,
        method: form.data.parse_method,
        lang: form.data.lang
      })
      console.log(`[parse] file=${file.originalname} engine=${outcome.metadata.engine} pages=${outcome.metadata.pages} ocr=${outcome.metadata.ocr_applied} ms=${outcome.metadata.processing_time_ms}`)
      return res.json(outcome)
    } catch (error) {
      console.error(`[parse] failed file=${file.originalname}`, error instanceof Error ? error.message : error)
      return sendParseFailure(res, error)
    }
  }
}
