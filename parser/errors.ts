import type { StyleType } from "./types";

export class DocxParserError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised while loading when the archive or its main part is not a
 * WordprocessingML document.
 */
export class DocxFormatError extends DocxParserError {}

/**
 * Raised when a style's `basedOn` links lead back to a style already visited.
 * `chain` lists the style ids in the order they were walked, ending with the
 * repeated id.
 */
export class StyleChainCycleError extends DocxParserError {
  readonly styleType: StyleType;
  readonly chain: string[];

  constructor(styleType: StyleType, chain: string[]) {
    super(`Cyclic ${styleType} style chain: ${chain.join(" -> ")}`);
    this.styleType = styleType;
    this.chain = chain;
  }
}
