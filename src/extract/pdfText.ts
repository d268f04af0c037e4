import { PDFParse } from "pdf-parse";
import { errorMessage } from "../core/errors";
import { parsePdfDate, type CalendarDate } from "./timestamp";

export interface ParserLike {
  getText(): Promise<{
    text: string;
    total: number;
    pages?: Array<{ text: string }>;
  }>;
  getInfo(): Promise<{ info?: unknown }>;
  destroy(): Promise<void>;
}

export type PdfParserFactory = (data: Buffer) => ParserLike;

export const defaultPdfParserFactory: PdfParserFactory = (data) => new PDFParse({ data });

export interface PdfDocumentText {
  text: string;
  pages: string[];
  pageCount: number;
  creationDate?: CalendarDate;
  /** Set when the document info dictionary could not be read; text is still usable. */
  infoError?: string;
}

function readCreationDate(info: unknown): CalendarDate | undefined {
  if (typeof info !== "object" || info === null || !("CreationDate" in info)) {
    return undefined;
  }
  return parsePdfDate(info.CreationDate);
}

export async function readPdfText(bytes: Buffer, parserFactory: PdfParserFactory = defaultPdfParserFactory): Promise<PdfDocumentText> {
  const parser = parserFactory(bytes);
  try {
    const parsed = await parser.getText();
    const pages = (parsed.pages ?? []).map((page) => page.text ?? "");

    let creationDate: CalendarDate | undefined;
    let infoError: string | undefined;
    try {
      const info = await parser.getInfo();
      creationDate = readCreationDate(info.info);
    } catch (error) {
      infoError = errorMessage(error);
    }

    return {
      text: parsed.text ?? "",
      pages,
      pageCount: parsed.total,
      creationDate,
      infoError,
    };
  } finally {
    await parser.destroy().catch(() => undefined);
  }
}
