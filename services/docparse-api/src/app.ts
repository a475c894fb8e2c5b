import express, { type NextFunction, type Request, type Response } from 'express'
import cors from 'cors'
import multer from 'multer'
import type { ServiceConfig } from './config.js'
import { createFileParseHandler } from './routes/fileParse.js'
import { createParseHandler } from './routes/parse.js'
import { errorMessage } from './services/commandRunner.js'
import type { DocumentParser } from './services/documentParser.js'
import { sendParseError } from './services/parseErrors.js'

export function createApp(params: { config: ServiceConfig; parser: DocumentParser }) {
  const { config, parser } = params
  const app = express()

  const allowAnyOrigin = config.corsOrigins.includes('*')
  app.use(cors({
    origin: (origin, callback) => {
      if (!origin || allowAnyOrigin) return callback(null, true)
      if (config.corsOrigins.includes(origin)) return callback(null, true)
      return callback(null, false)
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Authorization', 'Content-Type'],
    optionsSuccessStatus: 204
  }))

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.uploadMaxBytes }
  })

  app.get('/health', async (_req, res) => {
    let engines = {}
    try {
      engines = await parser.engineStatus()
    } catch (error) {
      console.error('[server] engine status check failed', errorMessage(error))
    }
    res.json({ status: 'healthy', version: config.version, engines })
  })

  app.post('/api/parse', upload.single('file'), createParseHandler(parser))
  app.post('/file_parse', upload.array('files'), createFileParseHandler(parser))

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(error)
    if (error instanceof multer.MulterError) {
      if (error.code === 'LIMIT_FILE_SIZE') {
        return sendParseError(res, 413, 'FILE_TOO_LARGE', `file exceeds ${config.uploadMaxBytes} bytes`)
      }
      return sendParseError(res, 400, 'INVALID_UPLOAD', error.message)
    }
    console.error('[server] unhandled error', errorMessage(error))
    return sendParseError(res, 500, 'INTERNAL_ERROR', errorMessage(error))
  })

  return app
}
