/**
 * Decoded response shapes.
 */

export type ImageFormat = "jpeg" | "png";

/** One image returned by the service. `filename` is advisory and may be changed. */
export interface Image {
  filename: string;
  readonly data: Buffer;
}

/** A partially denoised preview; always JPEG on the wire. */
export interface IntermediateEvent {
  readonly kind: "intermediate";
  readonly sampleIndex: number;
  readonly stepIndex: number;
  readonly generationId: string;
  readonly sigma: number;
  readonly format: ImageFormat;
  readonly image: Image;
}

/** The finished image for one sample; always PNG on the wire. */
export interface FinalEvent {
  readonly kind: "final";
  readonly sampleIndex: number;
  readonly generationId: string;
  readonly format: ImageFormat;
  readonly image: Image;
}

export type StreamEvent = IntermediateEvent | FinalEvent;
