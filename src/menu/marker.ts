// Telegram trims trailing whitespace, so the markers are Braille cells.
export const MARKER_ALPHABET = ["⠀", "⠁", "⠂", "⠃", "⠄", "⠅", "⠆", "⠇", "⠈", "⠉"] as const;

/**
 * One near-invisible character keyed by the last digit of `now`. Skips ahead
 * when it would repeat the marker already on the message.
 */
export const pickMarker = (now: number, previous?: string): string => {
  let index = Math.abs(Math.trunc(now)) % MARKER_ALPHABET.length;
  if (MARKER_ALPHABET[index] === previous) {
    index = (index + 1) % MARKER_ALPHABET.length;
  }
  return MARKER_ALPHABET[index];
};

const pad = (value: number): string => String(value).padStart(2, "0");

export const visibleMarker = (now: number): string => {
  const date = new Date(now);
  return `\n\n\`⟨ updated ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())} ⟩\``;
};
