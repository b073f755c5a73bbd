import { loadDocx, type LoadOptions, type WordDocument } from "./docxExtractor";
import { classifyDocument } from "./semanticClassifier";
import type { SemanticBlock } from "./types";

export async function parseDocument(buffer: Buffer | Uint8Array, options: LoadOptions = {}): Promise<{
  document: WordDocument;
  semantic: SemanticBlock[];
}> {
  const document = await loadDocx(buffer, options);
  const semantic = classifyDocument(document);

  if (options.debug) {
    console.log(`[parser] Classified ${semantic.length} paragraphs`);
  }

  return { document, semantic };
}

export * from "./types";
export * from "./errors";
export * from "./documentTree";
export * from "./paragraph";
export * from "./styles";
export * from "./numbering";
export * from "./docxExtractor";
export * from "./semanticClassifier";
