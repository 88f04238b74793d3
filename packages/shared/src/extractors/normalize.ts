/**
 * Text normalization applied by the caller before extraction.
 */

export interface NormalizeOptions {
  /** Uppercase the whole text. The built-in rules are written for uppercase labels. */
  uppercase: boolean;
}

export function prepareText(text: string, options: NormalizeOptions): string {
  return options.uppercase ? text.toUpperCase() : text;
}
