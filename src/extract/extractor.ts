import { ExtractionError, errorMessage } from "../core/errors";
import { defaultPdfParserFactory, readPdfText, type PdfDocumentText, type PdfParserFactory } from "./pdfText";
import type { Logger } from "../observability";
import { parsePublicationTimestamp, type PublicationTimestamp } from "./timestamp";

export type ExtractionResult =
  | { ok: true; timestamp: PublicationTimestamp; text: string; pages: string[] }
  | { ok: false; error: ExtractionError; text?: string; pages?: string[] };

export interface ExtractOptions {
  utcOffset: string;
  parserFactory?: PdfParserFactory;
  logger?: Logger;
}

/**
 * Reads the publication date and time out of the rate sheet. A document that
 * cannot be parsed, or that carries no recognisable timestamp, yields
 * `ok: false` rather than throwing.
 */
export async function extractPublication(bytes: Buffer, options: ExtractOptions): Promise<ExtractionResult> {
  let pdf: PdfDocumentText;
  try {
    pdf = await readPdfText(bytes, options.parserFactory ?? defaultPdfParserFactory);
  } catch (error) {
    return {
      ok: false,
      error: new ExtractionError(`unable to read PDF text: ${errorMessage(error)}`, { cause: error }),
    };
  }

  if (pdf.infoError !== undefined) {
    // Without the info dictionary, ambiguous dates cannot use the CreationDate tie-break.
    options.logger?.warn("pdf_info_unreadable", { error: pdf.infoError });
  }

  const parseOptions = { utcOffset: options.utcOffset, creationDate: pdf.creationDate };
  const firstPage = pdf.pages[0];
  const fromFirstPage = firstPage ? parsePublicationTimestamp(firstPage, parseOptions) : undefined;
  const parsed = fromFirstPage?.ok ? fromFirstPage : parsePublicationTimestamp(pdf.text, parseOptions);

  if (!parsed.ok) {
    return {
      ok: false,
      error: new ExtractionError(parsed.reason),
      text: pdf.text,
      pages: pdf.pages,
    };
  }

  return { ok: true, timestamp: parsed.value, text: pdf.text, pages: pdf.pages };
}
