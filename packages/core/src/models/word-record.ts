export interface WordPosition {
  readonly left: number;
  readonly top: number;
  readonly right: number;
  readonly bottom: number;
  readonly center_x: number;
  readonly center_y: number;
}

export interface WordRecord {
  /** Trimmed, never empty */
  readonly text: string;
  /** Rotation of the page the word was found on, in degrees */
  readonly rotation: number;
  readonly position: WordPosition;
  /** Box height in pixels. A proxy, not a font metric */
  readonly font_size: number;
  /** Engine confidence, passed through unchanged (may be negative) */
  readonly confidence: number;
}
