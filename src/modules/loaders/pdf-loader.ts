import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";
import { DocumentUnreadableError, errorMessage } from "../../errors";
import type {
  IDocumentLoader,
  ISourceDocument,
  ISourcePage,
} from "../../interfaces";
import { createLogger } from "../../utils/logger";

type PdfjsModule = typeof import("pdfjs-dist/legacy/build/pdf.mjs");
let pdfjsPromise: Promise<PdfjsModule> | null = null;

async function getPdfjs(): Promise<PdfjsModule> {
  if (!pdfjsPromise) {
    pdfjsPromise = import("pdfjs-dist/legacy/build/pdf.mjs");
  }
  return pdfjsPromise;
}

const log = createLogger("pdf-loader");

/**
 * Extracts per-page text with pdfjs-dist. Text items on a page are joined with
 * a single space; pages keep their 1-based numbers.
 */
export class PdfDocumentLoader implements IDocumentLoader {
  supports(path: string): boolean {
    return extname(path).toLowerCase() === ".pdf";
  }

  async load(path: string): Promise<ISourceDocument> {
    let data: Buffer;
    try {
      data = await readFile(path);
    } catch (error) {
      throw new DocumentUnreadableError(path, errorMessage(error), {
        cause: error,
      });
    }
    return this.parse(new Uint8Array(data), basename(path));
  }

  async parse(data: Uint8Array, source: string): Promise<ISourceDocument> {
    try {
      const pdfjs = await getPdfjs();
      const pdf = await pdfjs.getDocument({
        data,
        useSystemFonts: true,
        isEvalSupported: false,
        verbosity: 0,
      }).promise;

      const pages: ISourcePage[] = [];
      try {
        for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
          const page = await pdf.getPage(pageNumber);
          const content = await page.getTextContent();
          const text = content.items
            .map((item) => ("str" in item ? item.str : ""))
            .join(" ");
          pages.push({ pageNumber, text });
        }
      } finally {
        await pdf.destroy();
      }

      log.info(`Parsed ${source}: ${pages.length} pages`);
      return { source, pages };
    } catch (error) {
      throw new DocumentUnreadableError(source, errorMessage(error), {
        cause: error,
      });
    }
  }
}
