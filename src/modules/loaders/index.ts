import { DocumentUnreadableError } from "../../errors";
import type { IDocumentLoader, ISourceDocument } from "../../interfaces";
import { PdfDocumentLoader } from "./pdf-loader";
import { TextDocumentLoader } from "./text-loader";

export { PdfDocumentLoader } from "./pdf-loader";
export { TextDocumentLoader, fromText } from "./text-loader";

export const DEFAULT_LOADERS: IDocumentLoader[] = [
  new PdfDocumentLoader(),
  new TextDocumentLoader(),
];

export async function loadDocument(
  path: string,
  loaders: IDocumentLoader[] = DEFAULT_LOADERS,
): Promise<ISourceDocument> {
  const loader = loaders.find((l) => l.supports(path));
  if (!loader) {
    throw new DocumentUnreadableError(path, "unsupported file type");
  }
  return loader.load(path);
}
