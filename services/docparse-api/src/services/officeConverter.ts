import { stat } from 'fs/promises'
import path from 'path'
import { errorMessage, runCommand, type CommandRunner } from './commandRunner.js'

export type OfficeConverterConfig = {
  sofficeBin: string
  timeoutMs: number
}

// Converts a DOCX/XLSX/PPTX file sitting in workDir to PDF next to it.
export async function convertOfficeToPdf(params: {
  inputPath: string
  workDir: string
  config: OfficeConverterConfig
  runner?: CommandRunner
}) {
  const runner = params.runner || runCommand
  const outputPath = path.join(params.workDir, `${path.parse(params.inputPath).name}.pdf`)

  try {
    await runner(params.config.sofficeBin, [
      '--headless',
      '--convert-to',
      'pdf',
      '--outdir',
      params.workDir,
      params.inputPath
    ], { timeoutMs: params.config.timeoutMs })
  } catch (error) {
    throw new Error(`OFFICE_CONVERSION_FAILED: ${errorMessage(error)}`)
  }

  try {
    await stat(outputPath)
  } catch {
    throw new Error('OFFICE_CONVERSION_FAILED: no PDF produced')
  }

  return { pdfPath: outputPath }
}
