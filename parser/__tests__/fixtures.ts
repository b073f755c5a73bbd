import JSZip from "jszip";

const NAMESPACES =
  'xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main" ' +
  'xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships"';

const DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

export function documentXml(body: string): string {
  return `${DECLARATION}<w:document ${NAMESPACES}><w:body>${body}</w:body></w:document>`;
}

export function stylesXml(styles: string): string {
  return `${DECLARATION}<w:styles ${NAMESPACES}>${styles}</w:styles>`;
}

export function numberingXml(definitions: string): string {
  return `${DECLARATION}<w:numbering ${NAMESPACES}>${definitions}</w:numbering>`;
}

export function footnotesXml(footnotes: string): string {
  return `${DECLARATION}<w:footnotes ${NAMESPACES}>${footnotes}</w:footnotes>`;
}

export function paragraphStyle(styleId: string, name: string, basedOn?: string): string {
  const basedOnXml = basedOn ? `<w:basedOn w:val="${basedOn}"/>` : "";
  return `<w:style w:type="paragraph" w:styleId="${styleId}"><w:name w:val="${name}"/>${basedOnXml}</w:style>`;
}

export interface DocxParts {
  document: string;
  styles?: string;
  numbering?: string;
  footnotes?: string;
}

export async function buildDocx(parts: DocxParts): Promise<Buffer> {
  const zip = new JSZip();
  zip.file("word/document.xml", parts.document);
  if (parts.styles) {
    zip.file("word/styles.xml", parts.styles);
  }
  if (parts.numbering) {
    zip.file("word/numbering.xml", parts.numbering);
  }
  if (parts.footnotes) {
    zip.file("word/footnotes.xml", parts.footnotes);
  }
  return zip.generateAsync({ type: "nodebuffer" });
}
