export const DEFAULT_COUNTRY = 'DE'
export const DEFAULT_LETTER_TYPE = 'standard'

export type TLetterRequest = {
  /** Path of the PDF to print and mail. */
  pdfPath: string
  name: string
  street: string
  zip: string
  city: string
  /** Country code, `DE` when omitted. */
  country?: string
  /** Letter type, `standard` when omitted. */
  type?: string
  /** Free-text reference; only sent when non-empty. */
  label?: string
}

export type TDocumentReader = {
  stat(path: string): Promise<{ isFile(): boolean }>
  readFile(path: string): Promise<Buffer>
}
