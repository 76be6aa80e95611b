import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";
import { DocumentUnreadableError, errorMessage } from "../../errors";
import type { IDocumentLoader, ISourceDocument } from "../../interfaces";

const TEXT_EXTENSIONS = new Set([".txt", ".md", ".markdown"]);

/** Plain text and markdown. A form feed starts a new page. */
export class TextDocumentLoader implements IDocumentLoader {
  supports(path: string): boolean {
    return TEXT_EXTENSIONS.has(extname(path).toLowerCase());
  }

  async load(path: string): Promise<ISourceDocument> {
    let content: string;
    try {
      content = await readFile(path, "utf8");
    } catch (error) {
      throw new DocumentUnreadableError(path, errorMessage(error), {
        cause: error,
      });
    }
    return fromText(basename(path), content);
  }
}

export function fromText(source: string, content: string): ISourceDocument {
  return {
    source,
    pages: content
      .split("\f")
      .map((text, i) => ({ pageNumber: i + 1, text })),
  };
}
