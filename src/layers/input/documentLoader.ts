import { mkdir, readdir, readFile } from "node:fs/promises";
import { createRequire } from "node:module";
import path from "node:path";

import type pdfParseFn from "pdf-parse";

import { formatError } from "../../domain/errors.js";
import { DocumentStats, DocumentUnit, SourceDocument } from "../../domain/models.js";
import { createId, normalizeWhitespace } from "../../utils/text.js";
import { TokenizerAdapter } from "../tokenizer/tokenizerAdapter.js";

const FORM_FEED = "\f";
const SUPPORTED_EXTENSIONS = new Set([".pdf", ".txt", ".md"]);

interface PdfTextContent {
  items: unknown[];
}

/** The part of a pdf.js page proxy that pdf-parse hands to `pagerender`. */
export interface PdfPageData {
  getTextContent(options: { normalizeWhitespace: boolean; disableCombineTextItems: boolean }): Promise<PdfTextContent>;
}

type PdfParse = (
  buffer: Buffer,
  options: { pagerender: (pageData: PdfPageData) => Promise<string> }
) => ReturnType<typeof pdfParseFn>;

const requireCjs = createRequire(import.meta.url);

export class DocumentLoader {
  constructor(private readonly directory: string) {}

  async loadDocuments(): Promise<SourceDocument[]> {
    await mkdir(this.directory, { recursive: true });

    const entries = await readdir(this.directory, { withFileTypes: true });
    const filePaths = entries
      .filter((entry) => entry.isFile() && SUPPORTED_EXTENSIONS.has(path.extname(entry.name).toLowerCase()))
      .map((entry) => path.join(this.directory, entry.name))
      .sort();

    const documents = await Promise.all(filePaths.map((filePath) => this.tryLoad(filePath)));
    return documents.filter((document): document is SourceDocument => document !== null);
  }

  async loadDocument(filePath: string): Promise<SourceDocument> {
    const title = path.basename(filePath, path.extname(filePath));
    // Keyed by the full file name so notes.md and notes.txt stay distinct.
    const units =
      path.extname(filePath).toLowerCase() === ".pdf"
        ? toUnits(await this.extractPdfPages(filePath))
        : splitIntoUnits(await readFile(filePath, "utf8"), FORM_FEED);

    return {
      id: createId("document", path.basename(filePath)),
      title,
      filePath,
      importedAt: new Date().toISOString(),
      units
    };
  }

  private async tryLoad(filePath: string): Promise<SourceDocument | null> {
    const fileName = path.basename(filePath);

    try {
      const document = await this.loadDocument(filePath);
      if (document.units.length === 0) {
        console.warn(`[input] "${fileName}" has no extractable text (scanned or image-based?). Skipping.`);
        return null;
      }

      console.log(`[input] Loaded "${fileName}" with ${document.units.length} unit(s)`);
      return document;
    } catch (error) {
      console.warn(`[input] "${fileName}" could not be read: ${formatError(error)}. Skipping.`);
      return null;
    }
  }

  private async extractPdfPages(pdfPath: string): Promise<string[]> {
    const pdfBuffer = await readFile(pdfPath);
    // Through require, not import(): pdf-parse runs a bundled self-test when it has no parent module.
    const pdfParse: PdfParse = requireCjs("pdf-parse");
    const pages: string[] = [];

    // pdf-parse renders one page at a time, in page order.
    await pdfParse(pdfBuffer, {
      pagerender: async (pageData) => {
        const text = await renderPageText(pageData);
        pages.push(text);
        return text;
      }
    });

    return pages;
  }
}

/**
 * Splits raw text into 1-based units. Blank units are dropped but the remaining ones keep
 * their original position, so page 3 stays unit 3 even when page 2 is empty.
 */
export function splitIntoUnits(text: string, separator: string): DocumentUnit[] {
  return toUnits(text.split(separator));
}

export function toUnits(rawUnits: readonly string[]): DocumentUnit[] {
  return rawUnits
    .map((raw, position) => ({ index: position + 1, text: normalizeWhitespace(raw) }))
    .filter((unit) => unit.text.length > 0);
}

/** Joins a page's text items, starting a new line whenever the baseline moves. */
export async function renderPageText(pageData: PdfPageData): Promise<string> {
  const content = await pageData.getTextContent({ normalizeWhitespace: false, disableCombineTextItems: false });
  let text = "";
  let lastY: number | undefined;

  for (const item of content.items) {
    if (!isTextItem(item)) {
      continue;
    }
    const y = item.transform[5];
    text += lastY === undefined || y === lastY ? item.str : `\n${item.str}`;
    lastY = y;
  }

  return text;
}

// Marked-content items carry no `str`.
function isTextItem(item: unknown): item is { str: string; transform: number[] } {
  return (
    typeof item === "object" &&
    item !== null &&
    "str" in item &&
    typeof item.str === "string" &&
    "transform" in item &&
    Array.isArray(item.transform)
  );
}

export function documentStats(document: SourceDocument, tokenizer: TokenizerAdapter): DocumentStats {
  const totalChars = document.units.reduce((total, unit) => total + unit.text.length, 0);
  const totalTokens = document.units.reduce((total, unit) => total + tokenizer.countTokens(unit.text), 0);
  const unitCount = document.units.length;

  return {
    unitCount,
    totalChars,
    totalTokens,
    averageTokensPerUnit: unitCount > 0 ? Math.round((totalTokens / unitCount) * 10) / 10 : 0
  };
}
