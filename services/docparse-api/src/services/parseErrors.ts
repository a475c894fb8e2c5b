import type { Response } from 'express'
import { errorMessage } from './commandRunner.js'
import { ParseFailure } from './documentParser.js'

export function sendParseError(res: Response, status: number, code: string, message?: string) {
  return res.status(status).json({ code, message: message || code })
}

export function sendParseFailure(res: Response, error: unknown) {
  if (error instanceof ParseFailure) {
    if (error.allUnavailable) {
      return sendParseError(res, 503, 'ENGINE_UNAVAILABLE', error.message)
    }
    return sendParseError(res, 500, 'PARSE_FAILED', error.message)
  }

  const message = errorMessage(error)
  if (message === 'UNSUPPORTED_FILE_TYPE') {
    return sendParseError(res, 400, 'UNSUPPORTED_FILE_TYPE', 'Unsupported file type')
  }
  return sendParseError(res, 500, 'INTERNAL_ERROR', message)
}
