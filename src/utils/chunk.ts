export const TELEGRAM_MAX_MESSAGE_CHARS = 4096;

/**
 * Offset inside `window` to cut at: a paragraph break when one sits in the
 * second half, else the last line break or space. Returns 0 when there is none.
 */
const chooseCut = (window: string) => {
  const paragraph = window.lastIndexOf("\n\n");
  if (paragraph > window.length / 2) {
    return paragraph;
  }
  return Math.max(0, window.lastIndexOf("\n"), window.lastIndexOf(" "));
};

function* sliceMessage(text: string, maxChars: number): Generator<string> {
  let rest = text;
  while (rest.length > maxChars) {
    const cut = chooseCut(rest.slice(0, maxChars)) || maxChars;
    yield rest.slice(0, cut);
    rest = rest.slice(cut);
  }
  yield rest;
}

/**
 * Splits `text` into pieces no longer than `maxChars` that concatenate back to
 * the input. Whitespace-only pieces, which Telegram rejects, are skipped.
 */
export const chunkTelegramMessage = (
  text: string,
  maxChars = TELEGRAM_MAX_MESSAGE_CHARS,
) => {
  if (text.length <= maxChars) {
    return [text];
  }
  return Array.from(sliceMessage(text, maxChars)).filter(
    (piece) => piece.trim().length > 0,
  );
};
