import os from 'os'
import path from 'path'
import { z } from 'zod'

const booleanFlag = (fallback: boolean) => z
  .string()
  .optional()
  .transform((value, ctx) => {
    const normalized = String(value ?? '').trim().toLowerCase()
    if (!normalized) return fallback
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` })
    return z.NEVER
  })

const optionalText = z
  .string()
  .optional()
  .transform((value) => String(value ?? '').trim() || null)

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  MINERU_MODELS_DIR: z.string().trim().min(1).default('/data/models'),
  MINERU_CONFIG_PATH: optionalText,
  MINERU_DEVICE_MODE: z.enum(['cpu', 'cuda', 'mps']).default('cpu'),
  MINERU_TABLE_ENABLE: booleanFlag(false),
  MINERU_FORMULA_ENABLE: booleanFlag(true),
  MINERU_BIN: z.string().trim().min(1).default('mineru'),
  MINERU_BACKEND: z.string().trim().min(1).default('pipeline'),
  MINERU_TIMEOUT_MS: z.coerce.number().int().positive().default(600000),
  MINERU_HF_REPO: z.string().trim().min(1).default('wanderkid/PDF-Extract-Kit'),
  MINERU_DOWNLOAD_ON_START: booleanFlag(true),
  SOFFICE_BIN: z.string().trim().min(1).default('soffice'),
  OCR_DEFAULT_LANG: z.string().trim().min(1).default('eng'),
  TESSDATA_DIR: optionalText,
  UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(100 * 1024 * 1024),
  CORS_ORIGINS: optionalText,
  APP_VERSION: z.string().trim().min(1).default('1.0.0')
})

export type ServiceConfig = {
  port: number
  version: string
  corsOrigins: string[]
  uploadMaxBytes: number
  mineru: {
    modelsDir: string
    configPath: string
    deviceMode: 'cpu' | 'cuda' | 'mps'
    tableEnabled: boolean
    formulaEnabled: boolean
    bin: string
    backend: string
    timeoutMs: number
    hfRepo: string
    downloadOnStart: boolean
  }
  office: {
    sofficeBin: string
  }
  ocr: {
    defaultLang: string
    tessdataDir: string | null
  }
}

// Blank strings count as unset so that `FOO=` in a .env file falls back to the default.
function compactEnv(env: NodeJS.ProcessEnv) {
  const out: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value != null && value.trim() !== '') out[key] = value
  }
  return out
}

export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = envSchema.safeParse(compactEnv(env))
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(`INVALID_CONFIG: ${details}`)
  }

  const values = parsed.data
  const corsOrigins = (values.CORS_ORIGINS || '*')
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean)

  return {
    port: values.PORT,
    version: values.APP_VERSION,
    corsOrigins,
    uploadMaxBytes: values.UPLOAD_MAX_BYTES,
    mineru: {
      modelsDir: values.MINERU_MODELS_DIR,
      configPath: values.MINERU_CONFIG_PATH || path.join(os.homedir(), 'magic-pdf.json'),
      deviceMode: values.MINERU_DEVICE_MODE,
      tableEnabled: values.MINERU_TABLE_ENABLE,
      formulaEnabled: values.MINERU_FORMULA_ENABLE,
      bin: values.MINERU_BIN,
      backend: values.MINERU_BACKEND,
      timeoutMs: values.MINERU_TIMEOUT_MS,
      hfRepo: values.MINERU_HF_REPO,
      downloadOnStart: values.MINERU_DOWNLOAD_ON_START
    },
    office: {
      sofficeBin: values.SOFFICE_BIN
    },
    ocr: {
      defaultLang: values.OCR_DEFAULT_LANG,
      tessdataDir: values.TESSDATA_DIR
    }
  }
}
