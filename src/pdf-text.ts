export type TextExtractor = (pdfBuffer: Buffer) => Promise<string>;

/**
 * Full text of an ordinance PDF, pages joined with newlines in page order
 */
export async function extractPdfText(pdfBuffer: Buffer): Promise<string> {
  const { PDFParse } = await import('pdf-parse');
  const parser = new PDFParse({ data: new Uint8Array(pdfBuffer) });
  try {
    const result = await parser.getText();
    return result.pages.map(p => p.text).join('\n');
  } finally {
    await parser.destroy();
  }
}
