// Markdown-ish model output to the HTML subset Telegram accepts.

const MARKDOWN_HINT =
  /```[\s\S]*?```|`[^`\n]+`|\*\*[^*\n]+\*\*|__[^_\n]+__|~~[^~\n]+~~|\[[^\]\n]+\]\((?:https?|tg):\/\/[^)]+\)|^#{1,6}\s.+$/m;

const TELEGRAM_PARSE_ERROR =
  /can't parse entities|can't find end of the entity|entity parse|parse_mode/i;

const HTML_ESCAPES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
};

export const escapeHtml = (value: string) =>
  value.replace(/[&<>]/g, (char) => HTML_ESCAPES[char] ?? char);

export const hasLikelyMarkdownFormatting = (text: string) => MARKDOWN_HINT.test(text);

export const isTelegramParseModeError = (error: unknown) =>
  TELEGRAM_PARSE_ERROR.test(error instanceof Error ? error.message : String(error));

/** Holds already-rendered code so later passes cannot touch its contents. */
class CodeVault {
  private readonly parts: string[] = [];

  keep(html: string) {
    this.parts.push(html);
    return `\u0000${this.parts.length - 1}\u0000`;
  }

  restore(text: string) {
    return text.replace(
      /\u0000(\d+)\u0000/g,
      (_match, index: string) => this.parts[Number(index)] ?? "",
    );
  }
}

// Applied in order to escaped text.
const INLINE_RULES: ReadonlyArray<readonly [RegExp, string]> = [
  [/\[([^\]\n]+)\]\(((?:https?|tg):\/\/[^)\s]+)\)/g, '<a href="$2">$1</a>'],
  [/^[ \t]*[-*][ \t]+/gm, "• "],
  [/\*\*([^\n*]+?)\*\*/g, "<b>$1</b>"],
  [/(^|[^*\w])\*([^\s*][^\n*]*?)\*(?![*\w])/g, "$1<i>$2</i>"],
  [/__([^\n_]+?)__/g, "<b>$1</b>"],
  [/~~([^\n~]+?)~~/g, "<s>$1</s>"],
  [/^#{1,6}\s+(.+)$/gm, "<b>$1</b>"],
];

export const renderTelegramHtmlFromMarkdown = (markdown: string) => {
  const vault = new CodeVault();

  const withoutCode = markdown
    .replace(/```([\w-]+)?\n?([\s\S]*?)```/g, (_match, lang: string | undefined, code: string) => {
      const body = escapeHtml(code.replace(/\n$/, ""));
      const language = lang?.trim();
      return vault.keep(
        language
          ? `<pre><code class="language-${escapeHtml(language)}">${body}</code></pre>`
          : `<pre>${body}</pre>`,
      );
    })
    .replace(/`([^`\n]+)`/g, (_match, code: string) => vault.keep(`<code>${escapeHtml(code)}</code>`));

  const rendered = INLINE_RULES.reduce(
    (text, [pattern, replacement]) => text.replace(pattern, replacement),
    escapeHtml(withoutCode),
  );

  return vault.restore(rendered);
};
