export interface TextWindow {
  start: number;
  text: string;
}

/**
 * Cuts `text` into windows of at most `size` characters where consecutive
 * windows share exactly `overlap` characters. Text no longer than `size` is a
 * single window; empty text yields none.
 */
export function splitIntoWindows(text: string, size: number, overlap: number): TextWindow[] {
  if (text.length === 0) {
    return [];
  }

  const step = size - overlap;
  const windows: TextWindow[] = [];

  for (let start = 0; ; start += step) {
    const end = Math.min(start + size, text.length);
    windows.push({ start, text: text.slice(start, end) });
    if (end === text.length) {
      break;
    }
  }

  return windows;
}
