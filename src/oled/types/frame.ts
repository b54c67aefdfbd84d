/**
 * Frame Types
 *
 * A frame is the full set of text draw instructions for one display update.
 */

export interface DrawInstruction {
  text: string;
  x: number;
  y: number;
}

export type Frame = readonly DrawInstruction[];

export interface DisplaySink {
  /** Prepares the panel; called once before the first frame */
  open(): Promise<void>;
  /** Rasterizes and pushes one frame */
  show(frame: Frame): Promise<void>;
  /** Blanks the panel and releases the transport */
  close(): Promise<void>;
}
