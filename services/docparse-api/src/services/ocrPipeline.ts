import { runOcrProvider, type OcrProviderConfig, type OcrProviderInput, type OcrProviderOutput } from './ocrProvider.js'
import { renderPdfPages } from './textExtraction.js'

export type OcrPipelineDeps = {
  recognize: (input: OcrProviderInput) => Promise<OcrProviderOutput>
  renderPages: (pdf: Buffer) => Promise<Buffer[]>
}

export const defaultOcrPipelineDeps: OcrPipelineDeps = {
  recognize: runOcrProvider,
  renderPages: renderPdfPages
}

export async function runImageOcr(params: {
  image: Buffer
  lang?: string | null
  config: OcrProviderConfig
  deps?: OcrPipelineDeps
}) {
  const deps = params.deps || defaultOcrPipelineDeps
  const result = await deps.recognize({
    image: params.image,
    lang: params.lang,
    config: params.config
  })

  return {
    text: String(result.text || '').trim()
  }
}

export async function runPdfOcr(params: {
  pdf: Buffer
  lang?: string | null
  config: OcrProviderConfig
  deps?: OcrPipelineDeps
}) {
  const deps = params.deps || defaultOcrPipelineDeps
  const images = await deps.renderPages(params.pdf)
  if (images.length === 0) {
    throw new Error('PDF_RENDER_EMPTY')
  }

  const pages: string[] = []
  for (const image of images) {
    const { text } = await runImageOcr({ image, lang: params.lang, config: params.config, deps })
    pages.push(text)
  }

  return {
    text: pages.filter(Boolean).join('\n\n'),
    pages: images.length
  }
}
