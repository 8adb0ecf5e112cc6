import { readFile } from 'fs/promises'
import pdfParse from 'pdf-parse'

/**
 * Text layer of every page, in page order. pdf-parse separates pages with
 * blank lines; the result is trimmed.
 */
export async function readPdfText(filePath: string): Promise<string> {
    const buffer = await readFile(filePath)
    const data = await pdfParse(buffer)
    return (data.text || '').replace(/\u0000/g, '').trim()
}
