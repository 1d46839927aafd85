/** Engine cells may arrive as numbers or as the strings of a text table */
export type TokenCell = string | number;

/**
 * Word-level output of an OCR engine as parallel arrays.
 * Index `i` of every column describes the same token.
 */
export interface TokenTable {
  text: string[];
  left: TokenCell[];
  top: TokenCell[];
  width: TokenCell[];
  height: TokenCell[];
  conf: TokenCell[];
}

export interface OcrEnginePort {
  /** Check that the engine can be invoked. Throws EngineUnavailableError otherwise */
  verify(): Promise<void>;
  /** Orientation/script detection report as free text */
  detectOrientation(imagePath: string): Promise<string>;
  /** Word-level token table */
  extractTokens(imagePath: string): Promise<TokenTable>;
  /** Release engine resources */
  terminate?(): Promise<void>;
}
