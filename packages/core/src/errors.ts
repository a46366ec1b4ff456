/**
 * Rendering error taxonomy
 */

export type PixelArtError =
  | { readonly kind: "character-not-found"; readonly character: string }
  | { readonly kind: "text-too-long"; readonly length: number; readonly maxLength: number }
  | { readonly kind: "empty-text" };

/** Outcome of a validation or render call */
export type RenderResult<T> =
  | { success: true; value: T }
  | { success: false; error: PixelArtError };

export function characterNotFound(character: string): PixelArtError {
  return { kind: "character-not-found", character };
}

export function textTooLong(length: number, maxLength: number): PixelArtError {
  return { kind: "text-too-long", length, maxLength };
}

export function emptyText(): PixelArtError {
  return { kind: "empty-text" };
}

/**
 * One-line diagnostic for an error
 */
export function describeError(error: PixelArtError): string {
  switch (error.kind) {
    case "character-not-found":
      return `Character '${error.character}' not found in font`;
    case "text-too-long":
      return `Text too long: ${error.length} characters (max: ${error.maxLength})`;
    case "empty-text":
      return "Text is empty";
  }
}
