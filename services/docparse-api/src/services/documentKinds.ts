export type DocumentKind = 'pdf' | 'image' | 'docx' | 'xlsx' | 'pptx' | 'csv' | 'md' | 'txt' | 'unsupported'

export const PARSE_METHODS = ['auto', 'ocr', 'txt'] as const
export type ParseMethod = typeof PARSE_METHODS[number]

const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.tif', '.tiff', '.bmp', '.webp']

export function fileExtension(fileName: string | null | undefined) {
  const name = String(fileName || '').toLowerCase()
  const dot = name.lastIndexOf('.')
  return dot >= 0 ? name.slice(dot) : ''
}

export function classifyDocument(mime: string | null | undefined, fileName: string | null | undefined): DocumentKind {
  const m = String(mime || '').toLowerCase()
  const ext = fileExtension(fileName)
  if (m.includes('pdf') || ext === '.pdf') return 'pdf'
  if (m.startsWith('image/') || IMAGE_EXTENSIONS.includes(ext)) return 'image'
  if (m.includes('wordprocessingml') || ext === '.docx') return 'docx'
  if (m.includes('spreadsheetml') || ext === '.xlsx') return 'xlsx'
  if (m.includes('presentationml') || ext === '.pptx') return 'pptx'
  if (m.includes('csv') || ext === '.csv') return 'csv'
  if (m.includes('markdown') || ext === '.md') return 'md'
  if (m.includes('text/plain') || ext === '.txt') return 'txt'
  return 'unsupported'
}

export function isOfficeKind(kind: DocumentKind) {
  return kind === 'docx' || kind === 'xlsx' || kind === 'pptx'
}
